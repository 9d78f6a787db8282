// Utility wrapper for jsonrepair
import { jsonrepair } from 'jsonrepair';
import { isRecord } from '../types/directives';

export default function tryJsonRepair(input: string): string | null {
  try {
    return jsonrepair(input);
  } catch {
    return null;
  }
}

/**
 * Decode a JSON object emitted by a model: strict parse first, repaired parse second.
 * Anything that does not end up as a plain object yields null.
 */
export function parseJsonObject(input: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(input);
    return isRecord(parsed) ? parsed : null;
  } catch {
    const repaired = tryJsonRepair(input);
    if (!repaired) return null;
    try {
      const parsed: unknown = JSON.parse(repaired);
      return isRecord(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }
}
