import fs from 'node:fs';
import { z } from 'zod';
import defaultDirectory from './properties.json';

/**
 * Static mapping from PMS hotel identifier to the property's display name.
 * Loaded once at startup; never mutated at runtime.
 */
export type PropertyDirectory = ReadonlyMap<string, string>;

const directoryFileSchema = z.object({
  properties: z
    .array(
      z.object({
        hotelId: z.coerce.string().min(1),
        name: z.string().min(1),
      }),
    )
    .min(1, 'property directory must list at least one property'),
});

export function buildPropertyDirectory(input: unknown): PropertyDirectory {
  const parsed = directoryFileSchema.parse(input);
  return new Map(parsed.properties.map((p) => [p.hotelId.trim(), p.name.trim()]));
}

/**
 * Load the directory from a JSON file, or the bundled one when no path is given.
 */
export function loadPropertyDirectory(filePath?: string): PropertyDirectory {
  if (!filePath) return buildPropertyDirectory(defaultDirectory);

  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return buildPropertyDirectory(raw);
}

export function getPropertyName(
  directory: PropertyDirectory,
  hotelId: string,
): string | undefined {
  return directory.get(hotelId);
}

/** Hotel ids in directory order; used when a sync does not name a subset. */
export function listHotelIds(directory: PropertyDirectory): string[] {
  return [...directory.keys()];
}
