import { z } from "zod";
import { readJson } from "../utils/fs";
import { parseWithSchema } from "../validation/parse";

const PartSchema = z
  .object({
    seq: z.number().int().default(0),
    path: z.string().min(1)
  })
  .passthrough();

export const VaultManifestSchema = z.object({
  account: z.string().default("unknown"),
  source: z.string().default("unknown"),
  totals: z
    .object({
      records: z.number().int().default(0)
    })
    .passthrough()
    .default({ records: 0 }),
  // null counts as "no parts", same as a missing key
  parts: z
    .array(PartSchema)
    .nullish()
    .transform((parts) => parts ?? [])
});

export type VaultManifest = z.infer<typeof VaultManifestSchema>;
export type ManifestPart = z.infer<typeof PartSchema>;

export async function readManifest(manifestPath: string): Promise<VaultManifest> {
  const data = await readJson<unknown>(manifestPath);
  return parseWithSchema(VaultManifestSchema, data, `Manifest ${manifestPath}`);
}

/** Parts in ascending `seq` order; the manifest's own order is not trusted. */
export function orderedParts(manifest: VaultManifest): ManifestPart[] {
  return [...manifest.parts].sort((a, b) => a.seq - b.seq);
}
