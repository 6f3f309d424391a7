#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { EnvironmentManager, WardlineConfig } from './config/EnvironmentManager';
import { createContainer, DependencyContainer, ServiceRegistry, TOKENS } from './core/DIContainer';
import { Message, SenderRole } from './moderation/types';
import { ModerationError } from './utils/errors';
import { Logger } from './utils/Logger';

dotenv.config();

const program = new Command();
const logger = Logger.create(Logger.resolveEnvironment(process.env['NODE_ENV']));
logger.getErrorHandler().installGlobalHandlers();

const CLI_ISSUER = { userId: 'cli', trusted: true };
const SENDER_ROLES: readonly SenderRole[] = ['admin', 'regular', 'bot'];

interface GlobalOptions {
  config?: string;
  env?: string;
}

interface Runtime {
  config: WardlineConfig;
  container: DependencyContainer<ServiceRegistry>;
  close: () => Promise<void>;
}

program
  .name('wardline')
  .description('Moderation decision engine for group chats: rules, AI classification and progressive enforcement')
  .version('1.0.0')
  .option('-c, --config <path>', 'Path to JSON configuration file', './config/wardline.json')
  .option('-e, --env <path>', 'Path to an additional .env file')
  .showHelpAfterError();

const banner = (message: string): void => {
  console.log(chalk.blue.bold(`Wardline: ${message}`));
};

const withAction = <T extends unknown[]>(label: string, action: (...args: T) => Promise<void>) => {
  return async (...args: T) => {
    try {
      await action(...args);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const code = error instanceof ModerationError ? ` [${error.code}]` : '';
      logger.error(`${label} failed`, { error: message });
      console.error(chalk.red(`${label} failed${code}:`), message);
      process.exitCode = 1;
    }
  };
};

const loadEnvFrom = (envPath?: string): void => {
  if (!envPath) {
    return;
  }
  const resolved = path.resolve(envPath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Env file not found at ${resolved}`);
  }
  dotenv.config({ path: resolved, override: true });
};

const loadConfig = async (): Promise<WardlineConfig> => {
  const options = program.opts<GlobalOptions>();
  loadEnvFrom(options.env);
  const manager = new EnvironmentManager(logger, logger.getErrorHandler(), options.config);
  return manager.loadConfiguration();
};

const bootstrap = async (): Promise<Runtime> => {
  const config = await loadConfig();
  const runtimeLogger = new Logger(config.logging.level, config.logging.file);
  const container = createContainer(config, { logger: runtimeLogger });

  const db = container.resolve(TOKENS.Database);
  await db.initialize();

  return {
    config,
    container,
    close: async () => {
      const ledger = container.resolve(TOKENS.ViolationLedger);
      await ledger.flushPending();
      ledger.stop();
      container.resolve(TOKENS.QuotaGovernor).stop();
      container.resolve(TOKENS.ClassifierCache).destroy();
      await db.close();
      await runtimeLogger.close();
    }
  };
};

const withRuntime = async (work: (runtime: Runtime) => Promise<void>): Promise<void> => {
  const runtime = await bootstrap();
  try {
    await work(runtime);
  } finally {
    await runtime.close();
  }
};

const parseRole = (value: string): SenderRole => {
  const role = SENDER_ROLES.find(candidate => candidate === value);
  if (!role) {
    throw new Error(`Role must be one of: ${SENDER_ROLES.join(', ')}`);
  }
  return role;
};

const buildMessage = (chatId: string, userId: string, text: string, role: string): Message => ({
  messageId: `cli-${Date.now()}`,
  chatId,
  userId,
  text,
  timestamp: new Date(),
  role: parseRole(role),
  isSudo: false
});

program
  .command('serve')
  .description('Start the operator API and the background sweep')
  .option('-p, --port <number>', 'Port to listen on (overrides configuration)')
  .action(
    withAction('API server', async (options: { port?: string }) => {
      banner('API server');
      const runtime = await bootstrap();
      const { container, config } = runtime;

      if (options.port !== undefined) {
        const port = Number(options.port);
        if (Number.isNaN(port)) {
          throw new Error('Port must be a number.');
        }
        config.api.port = port;
      }

      const ledger = container.resolve(TOKENS.ViolationLedger);
      const governor = container.resolve(TOKENS.QuotaGovernor);
      const sweep = container.resolve(TOKENS.BatchSweep);
      const api = container.resolve(TOKENS.ApiServer);

      ledger.start();
      governor.start();
      if (config.sweep.enabled) {
        sweep.start();
      }
      await api.start();

      console.log(chalk.green(`Operator API available at http://localhost:${config.api.port}/api`));

      const shutdown = async (signal: string) => {
        console.log(chalk.yellow(`\nReceived ${signal}, shutting down...`));
        try {
          await api.stop();
          await sweep.stop();
          await runtime.close();
          process.exit(0);
        } catch (error) {
          logger.error('Error during shutdown', { error: String(error) });
          process.exit(1);
        }
      };

      process.on('SIGINT', () => void shutdown('SIGINT'));
      process.on('SIGTERM', () => void shutdown('SIGTERM'));
    })
  );

program
  .command('check <chatId> <userId> <text>')
  .description('Run one message through the moderation pipeline (actions go to the log)')
  .option('-r, --role <role>', 'Sender role: admin, regular or bot', 'regular')
  .action(
    withAction('Check', async (chatId: string, userId: string, text: string, options: { role: string }) => {
      banner('Check message');
      await withRuntime(async ({ container }) => {
        const pipeline = container.resolve(TOKENS.ModerationPipeline);
        const outcome = await pipeline.processMessage(buildMessage(chatId, userId, text, options.role));

        const verdict = outcome.verdict;
        console.log(chalk.gray('  Verdict:'), verdict ? `${verdict.category} (${verdict.severity}, ${verdict.source})` : 'none');
        if (verdict) {
          console.log(chalk.gray('  Reason:'), verdict.reason);
        }
        const actionColor = outcome.action.kind === 'none' ? chalk.green : chalk.red;
        console.log(chalk.gray('  Action:'), actionColor(outcome.action.kind), chalk.gray(outcome.action.reason));
        if (outcome.record) {
          console.log(chalk.gray('  Tier:'), outcome.record.tier, chalk.gray(`(${outcome.record.count} violations)`));
        }
      });
    })
  );

program
  .command('enqueue <chatId> <userId> <text>')
  .description('Add a message to the backlog handled by the batch sweep')
  .option('-r, --role <role>', 'Sender role: admin, regular or bot', 'regular')
  .action(
    withAction('Enqueue', async (chatId: string, userId: string, text: string, options: { role: string }) => {
      await withRuntime(async ({ container }) => {
        const cursor = await container
          .resolve(TOKENS.Database)
          .enqueuePendingMessage(buildMessage(chatId, userId, text, options.role));
        console.log(chalk.green(`Queued at cursor ${cursor}`));
      });
    })
  );

program
  .command('sweep')
  .description('Run one batch sweep pass over the backlog')
  .action(
    withAction('Sweep', async () => {
      banner('Batch sweep');
      await withRuntime(async ({ container }) => {
        const report = await container.resolve(TOKENS.BatchSweep).runOnce();
        console.log(chalk.gray('  Fetched:'), report.fetched);
        console.log(chalk.gray('  Processed:'), report.processed);
        console.log(chalk.gray('  Violations:'), report.violations);
        console.log(chalk.gray('  Checkpoint:'), report.checkpoint);
        if (report.deferred) {
          console.log(chalk.yellow('  Deferred: AI quota reserved for live traffic, remaining messages wait for the next pass'));
        }
      });
    })
  );

program
  .command('mode <chatId> [mode]')
  .description('Show or change the security mode of a chat (low, medium, extreme)')
  .action(
    withAction('Security mode', async (chatId: string, mode: string | undefined) => {
      await withRuntime(async ({ container }) => {
        const commands = container.resolve(TOKENS.ModerationCommands);
        if (mode === undefined) {
          console.log(`${chatId}: ${await commands.getSecurityMode(chatId)}`);
          return;
        }
        const updated = await commands.setSecurityMode(chatId, mode, CLI_ISSUER);
        console.log(chalk.green(`Security mode for ${chatId} set to ${updated}`));
      });
    })
  );

program
  .command('reset <chatId> <userId>')
  .description('Clear a user\'s violation record, including a permanent ban')
  .action(
    withAction('Reset', async (chatId: string, userId: string) => {
      await withRuntime(async ({ container }) => {
        const record = await container.resolve(TOKENS.ModerationCommands).resetUser(chatId, userId, CLI_ISSUER);
        console.log(chalk.green(`Violation record for ${userId} in ${chatId} reset (tier ${record.tier})`));
      });
    })
  );

program
  .command('ban <chatId> <userId>')
  .description('Ban a user, permanently unless a duration is given')
  .option('-d, --duration <minutes>', 'Ban length in minutes')
  .option('-r, --reason <text>', 'Reason recorded in the audit log')
  .action(
    withAction('Ban', async (chatId: string, userId: string, options: { duration?: string; reason?: string }) => {
      let durationMs: number | undefined;
      if (options.duration !== undefined) {
        const minutes = Number(options.duration);
        if (Number.isNaN(minutes) || minutes <= 0) {
          throw new Error('Duration must be a positive number of minutes.');
        }
        durationMs = minutes * 60 * 1000;
      }

      await withRuntime(async ({ container }) => {
        const result = await container
          .resolve(TOKENS.ModerationCommands)
          .banUser(chatId, userId, CLI_ISSUER, { durationMs, reason: options.reason });
        console.log(chalk.green(`${userId} in ${chatId}: ${result.action} (tier ${result.record.tier})`));
      });
    })
  );

program
  .command('unban <chatId> <userId>')
  .description('Lift a ban and clear the user\'s violation record')
  .action(
    withAction('Unban', async (chatId: string, userId: string) => {
      await withRuntime(async ({ container }) => {
        await container.resolve(TOKENS.ModerationCommands).unbanUser(chatId, userId, CLI_ISSUER);
        console.log(chalk.green(`${userId} unbanned in ${chatId}`));
      });
    })
  );

program
  .command('stats <chatId>')
  .description('Show stored moderation actions for a chat')
  .option('-n, --limit <number>', 'Number of recent actions to show', '20')
  .action(
    withAction('Stats', async (chatId: string, options: { limit: string }) => {
      banner(`Stats for ${chatId}`);
      const limit = Number(options.limit);
      if (Number.isNaN(limit) || limit <= 0) {
        throw new Error('Limit must be a positive number.');
      }

      await withRuntime(async ({ container }) => {
        const commands = container.resolve(TOKENS.ModerationCommands);
        const stats = await commands.getStats(chatId);
        console.log(chalk.gray('  Security mode:'), stats.securityMode);

        const actions = await container.resolve(TOKENS.Database).getRecentActions(chatId, limit);
        if (actions.length === 0) {
          console.log(chalk.yellow('  No moderation actions recorded.'));
          return;
        }
        console.log(chalk.yellow('\nRecent actions:'));
        actions.forEach((entry) => {
          const duration = entry.durationMs !== null ? ` ${Math.round(entry.durationMs / 60000)}m` : '';
          console.log(
            chalk.gray(`  ${entry.createdAt.toISOString()}`),
            `${entry.action}${duration}`,
            chalk.gray(`user=${entry.userId} ${entry.category ?? '-'}/${entry.severity} ${entry.reason}`)
          );
        });
      });
    })
  );

program
  .command('config')
  .description('Validate the configuration and print the effective settings')
  .action(
    withAction('Configuration', async () => {
      banner('Configuration');
      const config = await loadConfig();
      console.log(chalk.gray('  Default mode:'), config.defaultSecurityMode);
      console.log(chalk.gray('  Database:'), config.database.path);
      console.log(
        chalk.gray('  Primary model:'),
        config.providers.primary.apiKey !== '' ? config.providers.primary.model : chalk.yellow('disabled (no API key)')
      );
      console.log(
        chalk.gray('  Fallback model:'),
        config.providers.fallback.enabled ? config.providers.fallback.model : chalk.yellow('disabled')
      );
      console.log(chalk.gray('  Sudo user:'), config.sudoUserId ?? chalk.yellow('not set'));
      console.log(chalk.green('Configuration is valid.'));
    })
  );

program
  .command('logs')
  .description('Show the tail of the log file')
  .option('-n, --lines <number>', 'Number of lines to show', '50')
  .action(
    withAction('Logs', async (options: { lines: string }) => {
      const config = await loadConfig();
      const logFile = config.logging.file;
      if (!logFile || !fs.existsSync(logFile)) {
        throw new Error(`Log file not found at ${logFile ?? '(file logging disabled)'}`);
      }

      const lines = Number(options.lines);
      if (Number.isNaN(lines) || lines <= 0) {
        throw new Error('Lines must be a positive number.');
      }

      const content = fs.readFileSync(logFile, 'utf8');
      console.log(content.trimEnd().split(/\r?\n/).slice(-lines).join('\n'));
    })
  );

async function main(): Promise<void> {
  if (process.argv.length <= 2) {
    banner('Welcome');
    program.outputHelp();
    return;
  }

  await program.parseAsync(process.argv);
}

void main().catch((error: unknown) => {
  logger.error('CLI failed', { error: String(error) });
  console.error(chalk.red('Wardline failed to start:'), error);
  process.exit(1);
});
