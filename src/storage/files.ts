/**
 * JSON/YAML persistence. The format always follows the file extension.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname, extname } from 'path';
import { parse, stringify } from 'yaml';
import type { z } from 'zod';
import type { ModelQuery } from '../core/types.js';
import { GraphFormatError, UnsupportedFileFormatError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { AttackGraph } from '../graph/attack-graph.js';
import { serializedAttackGraphSchema } from './schema.js';

const logger = createLogger('files');

export type FileFormat = 'json' | 'yaml';

/**
 * Pick the format from the extension. Content is never sniffed.
 */
export function detectFormat(filePath: string): FileFormat {
  switch (extname(filePath).toLowerCase()) {
    case '.json':
      return 'json';
    case '.yml':
    case '.yaml':
      return 'yaml';
    default:
      throw new UnsupportedFileFormatError(filePath);
  }
}

/**
 * Read and parse a JSON or YAML file.
 */
export function loadDocument(filePath: string): unknown {
  const format = detectFormat(filePath);
  const content = readFileSync(filePath, 'utf-8');
  try {
    return format === 'json' ? JSON.parse(content) : parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new GraphFormatError(`Failed to parse ${filePath}: ${reason}`);
  }
}

/**
 * Serialize `data` to `filePath`, creating parent directories as needed.
 */
export function saveDocument(filePath: string, data: unknown): void {
  const format = detectFormat(filePath);
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const content =
    format === 'json' ? `${JSON.stringify(data, null, 2)}\n` : stringify(data, { lineWidth: 0 });
  writeFileSync(filePath, content, 'utf-8');
}

/**
 * Validate a parsed document against `schema`.
 */
export function validateDocument<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  source: string
): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new GraphFormatError(`Invalid document ${source}: ${issues}`);
  }
  return result.data;
}

export function saveAttackGraph(graph: AttackGraph, filePath: string): void {
  logger.info(`Saving ${graph} to ${filePath}`);
  saveDocument(filePath, graph.toDict());
}

/**
 * Load an attack graph. With a model, nodes are re-attached to its assets.
 */
export function loadAttackGraph(filePath: string, model?: ModelQuery): AttackGraph {
  logger.info(`Loading attack graph from ${filePath}`);
  const document = validateDocument(serializedAttackGraphSchema, loadDocument(filePath), filePath);
  return AttackGraph.fromDict(document, model);
}
