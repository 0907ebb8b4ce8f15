/**
 * Model response parsing
 * Turns free-form model output into a JSON object, tolerating code fences
 * and prose around the object.
 */

import type { ProviderResponse } from '../models/service-interfaces.js';

/**
 * Concatenate the text-typed content blocks of a response, ignoring everything else
 */
export function extractText(response: ProviderResponse): string {
  return response.content
    .filter(block => block.type === 'text')
    .map(block => block.text ?? '')
    .join('')
    .trim();
}

/**
 * Remove markdown code block markers around the payload
 */
export function stripCodeFence(text: string): string {
  return text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '');
}

/**
 * Extract the first balanced {...} span - handles nested braces and braces inside strings
 */
export function extractBalancedObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (escape) {
      escape = false;
      continue;
    }

    if (char === '\\' && inString) {
      escape = true;
      continue;
    }

    if (char === '"') {
      inString = !inString;
      continue;
    }

    if (inString) continue;

    if (char === '{') depth++;
    else if (char === '}') {
      depth--;
      if (depth === 0) {
        return text.substring(start, i + 1);
      }
    }
  }

  return null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Strict JSON first; then the first balanced object found after stripping fences.
 *
 * @throws Error when no JSON object can be recovered
 */
export function parseJsonObject(text: string): Record<string, unknown> {
  const strict = tryParse(text);
  if (strict.ok) {
    if (isRecord(strict.value)) {
      return strict.value;
    }
    throw new Error('Model output is JSON but not an object.');
  }

  const candidate = extractBalancedObject(stripCodeFence(text));
  if (candidate) {
    const repaired = tryParse(candidate);
    if (repaired.ok && isRecord(repaired.value)) {
      return repaired.value;
    }
  }

  throw new Error('No valid JSON object found.');
}
