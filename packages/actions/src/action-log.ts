import { readFile, writeFile } from 'node:fs/promises';
import { ValidationError } from '@eavstore/core';
import { validateAction } from './validate-action.js';

/** Validate every action, then render them as newline-delimited JSON. */
export function formatActionLog(actions: readonly unknown[]): string {
  return actions.map((action) => `${JSON.stringify(validateAction(action))}\n`).join('');
}

export async function writeActionFile(actions: readonly unknown[], dest: string): Promise<void> {
  await writeFile(dest, formatActionLog(actions), 'utf-8');
}

/** Decode an action log. Records are returned undecided; validation happens on replay. */
export function parseActionLog(text: string): unknown[] {
  const records: unknown[] = [];
  text.split('\n').forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed === '') return;
    try {
      records.push(JSON.parse(trimmed));
    } catch (error) {
      throw new ValidationError(
        `Line ${index + 1} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        'line',
        { line: index + 1 },
      );
    }
  });
  return records;
}

export async function readActionFile(path: string): Promise<unknown[]> {
  return parseActionLog(await readFile(path, 'utf-8'));
}
