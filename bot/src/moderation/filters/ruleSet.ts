import fs from 'fs';
import path from 'path';
import { ModerationError } from '../../utils/errors';
import { isSeverity, isViolationCategory, Severity, ViolationCategory } from '../types';

export interface CategoryRuleDefinition {
  category: ViolationCategory;
  severity: Severity;
  confidence: number;
  description: string;
  patterns: string[];
  /** Words that count as a match when spelled out with separators, e.g. "d.r.u.g.s". */
  bypassTerms: string[];
}

export interface SuspicionKeywordDefinition {
  category: ViolationCategory;
  keywords: string[];
}

export interface SplitRuleDefinition {
  windowMs: number;
  maxHistory: number;
  tradeTerms: string[];
  subjects: Array<{ category: ViolationCategory; terms: string[] }>;
}

export interface RuleSet {
  version: number;
  categories: CategoryRuleDefinition[];
  suspicionKeywords: SuspicionKeywordDefinition[];
  split: SplitRuleDefinition;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function invalid(message: string): ModerationError {
  return new ModerationError('CONFIG_INVALID', `Invalid rule set: ${message}`);
}

function parseCategory(raw: unknown, index: number): CategoryRuleDefinition {
  if (!isRecord(raw)) {
    throw invalid(`categories[${index}] must be an object`);
  }
  const { category, severity, confidence, description, patterns, bypassTerms } = raw;

  if (!isViolationCategory(category)) {
    throw invalid(`categories[${index}].category "${String(category)}" is not a known category`);
  }
  if (!isSeverity(severity) || severity === 'none') {
    throw invalid(`categories[${index}].severity "${String(severity)}" is not a violation severity`);
  }
  if (typeof confidence !== 'number' || confidence < 0 || confidence > 1) {
    throw invalid(`categories[${index}].confidence must be a number between 0 and 1`);
  }
  if (!isStringArray(patterns)) {
    throw invalid(`categories[${index}].patterns must be a list of strings`);
  }

  return {
    category,
    severity,
    confidence,
    description: typeof description === 'string' ? description : category,
    patterns,
    bypassTerms: isStringArray(bypassTerms) ? bypassTerms : []
  };
}

function parseSuspicion(raw: unknown, index: number): SuspicionKeywordDefinition {
  if (!isRecord(raw) || !isViolationCategory(raw.category) || !isStringArray(raw.keywords)) {
    throw invalid(`suspicionKeywords[${index}] needs a known category and a keyword list`);
  }
  return { category: raw.category, keywords: raw.keywords };
}

function parseSplit(raw: unknown): SplitRuleDefinition {
  if (!isRecord(raw)) {
    throw invalid('split must be an object');
  }
  const { windowMs, maxHistory, tradeTerms, subjects } = raw;

  if (typeof windowMs !== 'number' || windowMs <= 0) {
    throw invalid('split.windowMs must be a positive number');
  }
  if (typeof maxHistory !== 'number' || maxHistory < 2) {
    throw invalid('split.maxHistory must be at least 2');
  }
  if (!isStringArray(tradeTerms)) {
    throw invalid('split.tradeTerms must be a list of strings');
  }
  if (!Array.isArray(subjects)) {
    throw invalid('split.subjects must be a list');
  }

  return {
    windowMs,
    maxHistory,
    tradeTerms,
    subjects: subjects.map((subject, index) => {
      if (!isRecord(subject) || !isViolationCategory(subject.category) || !isStringArray(subject.terms)) {
        throw invalid(`split.subjects[${index}] needs a known category and a term list`);
      }
      return { category: subject.category, terms: subject.terms };
    })
  };
}

export function parseRuleSet(raw: unknown): RuleSet {
  if (!isRecord(raw)) {
    throw invalid('root must be an object');
  }
  if (!Array.isArray(raw.categories)) {
    throw invalid('categories must be a list');
  }

  return {
    version: typeof raw.version === 'number' ? raw.version : 1,
    categories: raw.categories.map(parseCategory),
    suspicionKeywords: Array.isArray(raw.suspicionKeywords) ? raw.suspicionKeywords.map(parseSuspicion) : [],
    split: parseSplit(raw.split)
  };
}

export function defaultRuleSetPath(): string {
  const besideSources = path.join(__dirname, '../../../schemas/rules.json');
  return fs.existsSync(besideSources) ? besideSources : path.join(process.cwd(), 'bot/schemas/rules.json');
}

export function loadRuleSet(filePath: string = defaultRuleSetPath()): RuleSet {
  if (!fs.existsSync(filePath)) {
    throw new ModerationError('CONFIG_INVALID', `Rule file not found at: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ModerationError('CONFIG_INVALID', `Rule file ${filePath} is not valid JSON`, { cause: error });
  }

  return parseRuleSet(parsed);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word, case-insensitive matcher for a plain term; inner spaces match any whitespace run.
 */
export function termPattern(term: string): RegExp {
  const body = escapeRegExp(term.trim().toLowerCase()).replace(/\s+/g, '\\s+');
  return new RegExp(`\\b${body}\\b`, 'i');
}
