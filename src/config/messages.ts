/**
 * Message catalog: the externally observable text of the stream:
 * progress lines per node, answer templates, error texts, the
 * end-of-stream sentinel, and the planning trigger keywords.
 *
 * Loaded from JSON (config/messages.json by default) and shape-checked
 * once at startup.
 */

import fs from 'fs';
import path from 'path';
import { ConfigError, createTypedError, errorMessage } from '../domain/errors';

export interface AnswerTemplates {
  /** Provisional answer written by the execute node. Placeholder: {prompt}. */
  executionSummary: string;
  /** Final answer after execution. Placeholder: {finalAnswer}. */
  taskComplete: string;
  /** Final answer when no execution was needed. Placeholder: {prompt}. */
  quickResponse: string;
}

export interface ErrorMessages {
  emptyPrompt: string;
  /** Prefix of the in-band error frame. */
  fatalPrefix: string;
  /** Result text when a run ends without a final answer. */
  missingAnswer: string;
}

export interface MessageCatalog {
  /** Progress line per node id. */
  progress: Record<string, string>;
  templates: AnswerTemplates;
  errors: ErrorMessages;
  endOfStream: string;
  triggerKeywords: string[];
}

/** Default catalog location: <project root>/config/messages.json. */
export const DEFAULT_MESSAGES_PATH = path.resolve(__dirname, '..', '..', 'config', 'messages.json');

/** Read and validate a catalog file. Throws ConfigError on any problem. */
export function loadMessageCatalog(filePath: string = DEFAULT_MESSAGES_PATH): MessageCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      createTypedError({
        code: 'VALIDATION.CONFIG',
        message: `Cannot read message catalog at ${filePath}: ${errorMessage(err)}`,
        details: { path: filePath },
      }),
    );
  }
  return parseMessageCatalog(raw, filePath);
}

/** Validate an already-parsed catalog value. */
export function parseMessageCatalog(raw: unknown, source = 'message catalog'): MessageCatalog {
  const problems: string[] = [];

  const root = asRecord(raw, 'root', problems);
  const progress = asStringMap(root?.progress, 'progress', problems);
  const templates = asRecord(root?.templates, 'templates', problems);
  const errors = asRecord(root?.errors, 'errors', problems);
  const endOfStream = asString(root?.endOfStream, 'endOfStream', problems);
  const triggerKeywords = asStringArray(root?.triggerKeywords, 'triggerKeywords', problems);

  const catalog: MessageCatalog = {
    progress,
    templates: {
      executionSummary: asString(templates?.executionSummary, 'templates.executionSummary', problems),
      taskComplete: asString(templates?.taskComplete, 'templates.taskComplete', problems),
      quickResponse: asString(templates?.quickResponse, 'templates.quickResponse', problems),
    },
    errors: {
      emptyPrompt: asString(errors?.emptyPrompt, 'errors.emptyPrompt', problems),
      fatalPrefix: asString(errors?.fatalPrefix, 'errors.fatalPrefix', problems),
      missingAnswer: asString(errors?.missingAnswer, 'errors.missingAnswer', problems),
    },
    endOfStream,
    triggerKeywords,
  };

  for (const [key, text] of Object.entries(catalog.progress)) {
    if (/\r?\n\r?\n/.test(text)) {
      problems.push(`progress.${key} must not contain a blank line`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(
      createTypedError({
        code: 'VALIDATION.CONFIG',
        message: `Invalid ${source}: ${problems.join('; ')}`,
        details: { problems },
      }),
    );
  }
  return catalog;
}

/** Replace `{name}` placeholders. Unknown placeholders are left as-is. */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : match,
  );
}

function asRecord(value: unknown, label: string, problems: string[]): Record<string, unknown> | undefined {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  problems.push(`${label} must be an object`);
  return undefined;
}

function asString(value: unknown, label: string, problems: string[]): string {
  if (typeof value === 'string' && value.length > 0) return value;
  problems.push(`${label} must be a non-empty string`);
  return '';
}

function asStringMap(value: unknown, label: string, problems: string[]): Record<string, string> {
  const record = asRecord(value, label, problems);
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(record ?? {})) {
    result[key] = asString(entry, `${label}.${key}`, problems);
  }
  return result;
}

function asStringArray(value: unknown, label: string, problems: string[]): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    problems.push(`${label} must be a non-empty array`);
    return [];
  }
  return value.map((entry, i) => asString(entry, `${label}[${i}]`, problems));
}
