import { z } from 'zod';

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

function describe(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

export function decode<S extends z.ZodTypeAny>(schema: S, value: unknown): DecodeResult<z.infer<S>> {
  const parsed = schema.safeParse(value);
  if (parsed.success) return { ok: true, value: parsed.data };
  return { ok: false, error: describe(parsed.error) };
}

/**
 * Decodes a JSON text against `schema`. Malformed JSON is reported the same
 * way as a shape mismatch.
 */
export function decodeJson<S extends z.ZodTypeAny>(schema: S, text: string): DecodeResult<z.infer<S>> {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (e) {
    return { ok: false, error: `invalid JSON: ${e instanceof Error ? e.message : String(e)}` };
  }
  return decode(schema, value);
}
