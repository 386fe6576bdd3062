import { z } from 'zod';
import type { Metadata } from '../types/index.js';

const MetadataSchema = z.record(z.unknown());

/** Decode a stored metadata blob. Anything that is not a JSON object reads as {}. */
export function parseMetadata(raw: string | null | undefined): Metadata {
  if (!raw) return {};
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    console.error(`Ignoring unreadable metadata blob: ${error}`);
    return {};
  }
  const parsed = MetadataSchema.safeParse(value);
  return parsed.success ? parsed.data : {};
}

export function serializeMetadata(metadata: Metadata): string {
  return JSON.stringify(metadata ?? {});
}
