import { readFile } from "fs/promises";
import { z } from "zod";
import { parseCriteria } from "../core/criteria";
import { NewSavedSearch } from "./repo.memory";

const seedSchema = z.object({
  searches: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      criteria: z.unknown(),
      notificationsEnabled: z.boolean().default(true),
    })
  ),
});

/** Saved searches for development mode, read from a JSON file */
export async function loadSeedFile(path: string): Promise<NewSavedSearch[]> {
  const raw: unknown = JSON.parse(await readFile(path, "utf8"));
  return parseSeed(raw);
}

export function parseSeed(raw: unknown): NewSavedSearch[] {
  const { searches } = seedSchema.parse(raw);
  const ids = new Set<string>();

  return searches.map((search) => {
    if (ids.has(search.id)) {
      throw new Error(`Duplicate saved search id in seed: ${search.id}`);
    }
    ids.add(search.id);
    return {
      id: search.id,
      name: search.name,
      criteria: parseCriteria(search.criteria),
      notificationsEnabled: search.notificationsEnabled,
    };
  });
}
