import { z } from 'zod';
import { DataIntegrityError } from './errors.js';
import type { GroupKey, TrackDefinition, WorkItem } from './types.js';

const fieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

function buildPayloadSchema(track: TrackDefinition) {
  const allowed = new Set(track.fields);
  return z.record(z.string(), fieldValueSchema).superRefine((payload, ctx) => {
    for (const key of Object.keys(payload)) {
      if (!allowed.has(key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown field "${key}"` });
      }
    }
  });
}

type PayloadSchema = ReturnType<typeof buildPayloadSchema>;

const payloadSchemas = new WeakMap<TrackDefinition, PayloadSchema>();

/**
 * Payload schema of a track: a flat map whose keys come from the track's field list.
 */
export function payloadSchemaFor(track: TrackDefinition): PayloadSchema {
  const cached = payloadSchemas.get(track);
  if (cached) {
    return cached;
  }

  const schema = buildPayloadSchema(track);
  payloadSchemas.set(track, schema);
  return schema;
}

/** Whitespace tokenization */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

export interface ItemMeasure {
  wordCount: number;
  /** Set when the payload could not be read; the item still counts with 0 words */
  issue: DataIntegrityError | null;
}

export function measureItem(track: TrackDefinition, item: Pick<WorkItem, 'id' | 'payload'>): ItemMeasure {
  const parsed = payloadSchemaFor(track).safeParse(item.payload);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => issue.message).join('; ');
    return {
      wordCount: 0,
      issue: new DataIntegrityError(item.id, `unreadable payload (${detail})`),
    };
  }

  const text = parsed.data[track.textField];
  if (typeof text !== 'string') {
    return {
      wordCount: 0,
      issue: new DataIntegrityError(item.id, `missing text field "${track.textField}"`),
    };
  }

  return { wordCount: countWords(text), issue: null };
}

/**
 * Build a group key from the track's key fields. Absent values become "".
 */
export function deriveGroupKey(track: TrackDefinition, payload: unknown): GroupKey {
  const record = z.record(z.string(), z.unknown()).safeParse(payload);
  const values = record.success ? record.data : {};
  return track.groupKeyFields.map((field) => {
    const value = values[field];
    return value === undefined || value === null ? '' : String(value);
  });
}
