import fs from "fs-extra";
import { z } from "zod";
import { errorMessage } from "./errors";

const mappingsSchema = z.object({
  influencers: z.record(z.string()),
});

export type TwitterMappings = z.infer<typeof mappingsSchema>;

export function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, " ").toLowerCase();
}

export function normalizeHandle(handle: string): string {
  return handle.trim().replace(/^@+/, "");
}

/**
 * Read the name -> Twitter handle mapping file. A missing or malformed file
 * yields an empty mapping so analyses can still run without Twitter data.
 */
export async function loadTwitterMappings(filePath: string): Promise<TwitterMappings> {
  if (!(await fs.pathExists(filePath))) {
    console.error(`❌ Twitter mappings file not found: ${filePath}`);
    return { influencers: {} };
  }

  try {
    const data: unknown = await fs.readJson(filePath);
    const result = mappingsSchema.safeParse(data);
    if (!result.success) {
      console.error(`❌ Twitter mappings file ${filePath} is malformed`);
      return { influencers: {} };
    }
    return result.data;
  } catch (error) {
    console.error(`❌ Could not read Twitter mappings ${filePath}:`, errorMessage(error));
    return { influencers: {} };
  }
}

export function findTwitterHandle(mappings: TwitterMappings, name: string): string | null {
  const wanted = normalizeName(name);
  if (!wanted) return null;

  for (const [person, handle] of Object.entries(mappings.influencers)) {
    if (normalizeName(person) === wanted) {
      return normalizeHandle(handle) || null;
    }
  }
  return null;
}
