import { z } from 'zod';
import type { Region } from './frame';

export const nonBlankSchema = z.string().trim().min(1);

// Number() reads a blank string as 0
const numeric = <T extends z.ZodTypeAny>(schema: T) => z.string().trim().min(1, 'Expected a number').pipe(schema);

export const channelSchema = numeric(z.coerce.number().int().min(0).max(255));

export const fractionSchema = numeric(z.coerce.number().min(0).max(1));

export const intervalSchema = numeric(z.coerce.number().int().positive());

const SIZE_REGEX = /^(\d+)x(\d+)$/i;

/**
 * `WxH`, both positive integers, e.g. `160x90`.
 */
export const sizeSchema = z
  .string()
  .regex(SIZE_REGEX, 'Expected WIDTHxHEIGHT')
  .transform((value) => {
    const [, width, height] = value.match(SIZE_REGEX) ?? [];
    return { width: Number(width), height: Number(height) };
  })
  .pipe(z.object({ width: z.number().int().positive(), height: z.number().int().positive() }));

/**
 * `left,top,right,bottom` as fractions of the frame.
 * Inverted rectangles are accepted; they simply sample nothing.
 */
export const regionSchema = z
  .string()
  .transform((value) => value.split(',').map((part) => part.trim()))
  .pipe(z.tuple([fractionSchema, fractionSchema, fractionSchema, fractionSchema]))
  .transform(([left, top, right, bottom]): Region => ({ left, top, right, bottom }));

/**
 * assertions
 */
export function assertUnreachable (message: string, value: never): never {
  throw new Error(`${message} ${String(value)}`);
}
