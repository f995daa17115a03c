import { z } from 'zod';
import { err, ok, type Result } from '../core/result.js';
import type { PaperRecord } from './types.js';

const identifier = z
  .union([z.string(), z.number().int()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1));

const rawRecordSchema = z
  .object({
    id: identifier.optional(),
    paper_id: identifier.optional(),
    title: z.string().trim().min(1)
  })
  .passthrough();

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

/** Validates a decoded value as a record; `paper_id` is accepted as the identifier. */
export const toPaperRecord = (value: unknown): Result<PaperRecord, string> => {
  const parsed = rawRecordSchema.safeParse(value);
  if (!parsed.success) {
    return err(describeIssues(parsed.error));
  }

  const id = parsed.data.id ?? parsed.data.paper_id;
  if (!id) {
    return err('id: Required');
  }

  return ok({ id, title: parsed.data.title });
};

export const parseJson = (text: string): Result<unknown, string> => {
  try {
    const value: unknown = JSON.parse(text);
    return ok(value);
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
};

export const parseRecordLine = (line: string): Result<PaperRecord, string> => {
  const decoded = parseJson(line);
  return decoded.ok ? toPaperRecord(decoded.value) : decoded;
};

/** Best-effort identifier for a value that failed validation, used to key its error report. */
export const salvageRecordId = (value: unknown): string | null => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return null;
  }

  for (const field of ['id', 'paper_id'] as const) {
    const candidate: unknown = Reflect.get(value, field);
    if ((typeof candidate === 'string' && candidate.trim().length > 0) || typeof candidate === 'number') {
      return String(candidate).trim();
    }
  }

  return null;
};

export const encodeRecordLines = (records: readonly PaperRecord[]): string =>
  records.map((record) => JSON.stringify({ id: record.id, title: record.title })).join('\n');
