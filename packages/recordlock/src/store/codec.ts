/**
 * Payload codecs for stores that persist payloads as text
 */

import type { z } from 'zod';
import { StoreError, StoreErrorCode } from '../errors/index.js';

/**
 * Converts payloads to and from their stored text form
 */
export interface PayloadCodec<T> {
  encode(payload: T): string;
  /** @throws StoreError(PAYLOAD_INVALID) when the text is not a valid payload */
  decode(text: string, key: string): T;
}

function parseJson(text: string, key: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (error) {
    throw new StoreError(StoreErrorCode.PAYLOAD_INVALID, `Stored payload for '${key}' is not valid JSON`, {
      cause: error,
      context: { key },
    });
  }
}

function encodeJson(payload: unknown): string {
  const text = JSON.stringify(payload);
  if (text === undefined) {
    throw new StoreError(StoreErrorCode.PAYLOAD_INVALID, 'Payload has no JSON representation');
  }
  return text;
}

/**
 * JSON codec. With a zod schema, decoded payloads are validated and
 * typed by the schema; without one they are `unknown`.
 *
 * @example
 * ```typescript
 * const Account = z.object({ balance: z.number() });
 * const store = new SqliteRecordStore({ database: db, codec: jsonCodec(Account) });
 * ```
 */
export function jsonCodec(): PayloadCodec<unknown>;
export function jsonCodec<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): PayloadCodec<T>;
export function jsonCodec<T>(
  schema?: z.ZodType<T, z.ZodTypeDef, unknown>
): PayloadCodec<T> | PayloadCodec<unknown> {
  if (!schema) {
    return {
      encode: (payload: unknown) => encodeJson(payload),
      decode: (text: string, key: string) => parseJson(text, key),
    };
  }

  return {
    encode: (payload: T) => encodeJson(payload),
    decode: (text: string, key: string): T => {
      const result = schema.safeParse(parseJson(text, key));
      if (!result.success) {
        throw new StoreError(
          StoreErrorCode.PAYLOAD_INVALID,
          `Stored payload for '${key}' does not match its schema: ${result.error.issues
            .map((issue) => issue.message)
            .join(', ')}`,
          { context: { key } }
        );
      }
      return result.data;
    },
  };
}
