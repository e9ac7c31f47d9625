import { Injectable, Logger } from '@nestjs/common';
import { isRecord } from '../../common/helper/document.helper';
import { errorMessage } from '../../common/helper/error.helper';

// Lazy and not nesting-aware: a `]` or `}` inside a string value, or a
// nested array in a bare array, ends the match early.
const ARRAY_PATTERN = /```(?:json)?\s*(\[[\s\S]*?\])\s*```|(\[[\s\S]*?\])/;
const OBJECT_PATTERN = /```(?:json)?\s*(\{[\s\S]*?\})\s*```|(\{[\s\S]*?\})/;

export interface ReminderCandidate {
  title?: string;
  date?: string;
  time?: string;
}

export type ExtractionResult =
  | { kind: 'array'; candidates: ReminderCandidate[] }
  | { kind: 'object'; candidate: ReminderCandidate }
  | { kind: 'unparseable'; details: string; raw: string }
  | { kind: 'none'; raw: string };

function readField(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function toCandidate(record: Record<string, unknown>): ReminderCandidate {
  return {
    title: readField(record.title),
    date: readField(record.date),
    time: readField(record.time),
  };
}

// fenced capture when that alternative matched, otherwise the bare one
function firstCapture(text: string, pattern: RegExp): string | undefined {
  const match = pattern.exec(text);
  if (!match) return undefined;
  return match[1] ?? match[2];
}

@Injectable()
export class ReminderExtractorService {
  private readonly logger = new Logger(ReminderExtractorService.name);

  /**
   * Carve reminder candidates out of raw LLM output. A JSON array is tried
   * first, then a single JSON object.
   */
  extract(raw: string): ExtractionResult {
    const candidates = this.extractArray(raw);
    if (candidates) return { kind: 'array', candidates };

    const objectText = firstCapture(raw, OBJECT_PATTERN);
    if (objectText === undefined) return { kind: 'none', raw };

    try {
      const parsed: unknown = JSON.parse(objectText);
      if (!isRecord(parsed)) {
        return { kind: 'unparseable', details: 'Not a JSON object', raw };
      }
      return { kind: 'object', candidate: toCandidate(parsed) };
    } catch (error) {
      return { kind: 'unparseable', details: errorMessage(error), raw };
    }
  }

  private extractArray(raw: string): ReminderCandidate[] | undefined {
    const arrayText = firstCapture(raw, ARRAY_PATTERN);
    if (arrayText === undefined) return undefined;

    try {
      const parsed: unknown = JSON.parse(arrayText);
      if (!Array.isArray(parsed) || parsed.length === 0) return undefined;
      const records = parsed.filter(isRecord);
      if (records.length !== parsed.length) {
        this.logger.warn('Array in LLM response holds non-object items');
        return undefined;
      }
      return records.map(toCandidate);
    } catch (error) {
      this.logger.warn(`Error extracting array: ${errorMessage(error)}`);
      return undefined;
    }
  }
}
