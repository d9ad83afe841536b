/**
 * Row schema for catalog CSV files
 *
 * Every cell arrives as a string. Required columns must be present; the
 * optional audio/metadata columns may be missing or left blank.
 */

import { z } from 'zod';

const TRUE_TOKENS = new Set(['true', 'yes', '1']);
const FALSE_TOKENS = new Set(['false', 'no', '0']);

const decimal = z.string()
  .trim()
  .min(1, 'must not be empty')
  .transform(Number)
  .pipe(z.number().finite());

const integer = z.string()
  .trim()
  .min(1, 'must not be empty')
  .transform(Number)
  .pipe(z.number().int());

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

function optionalCell<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(blankToUndefined, schema.optional());
}

export const explicitFlag = z.string()
  .trim()
  .toLowerCase()
  .transform((token, ctx) => {
    if (TRUE_TOKENS.has(token)) return true;
    if (FALSE_TOKENS.has(token)) return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `unrecognised explicit flag '${token}' (expected true/yes/1 or false/no/0)`,
    });
    return z.NEVER;
  });

export const TrackRowSchema = z.object({
  track_id: z.string().trim().min(1, 'must not be empty'),
  artists: z.string(),
  album_name: z.string(),
  track_name: z.string(),
  popularity: z.string()
    .trim()
    .min(1, 'must not be empty')
    .transform(Number)
    .pipe(z.number().int().min(0).max(100)),
  danceability: decimal,
  energy: decimal,
  tempo: decimal,
  valence: decimal,
  duration_ms: optionalCell(integer),
  explicit: optionalCell(explicitFlag),
  key: optionalCell(integer),
  mode: optionalCell(integer),
  time_signature: optionalCell(integer),
  loudness: optionalCell(decimal),
  speechiness: optionalCell(decimal),
  acousticness: optionalCell(decimal),
  instrumentalness: optionalCell(decimal),
  liveness: optionalCell(decimal),
  track_genre: optionalCell(z.string()),
});
