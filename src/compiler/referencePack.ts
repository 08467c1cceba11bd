import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const ReferencePackSchema = z
  .object({
    framework: z.string().min(1),
    assemblies: z.array(z.string().min(1)).min(1),
  })
  .strict();
export type ReferencePack = z.infer<typeof ReferencePackSchema>;

// Resolves the same from src/compiler and dist/compiler.
const defaultPackFile = fileURLToPath(
  new URL('../../data/referenceAssemblies.json', import.meta.url),
);

const loaded = new Map<string, ReferencePack>();

/** Framework reference assemblies passed explicitly to the SDK compiler. */
export function loadReferencePack(file: string = defaultPackFile): ReferencePack {
  const hit = loaded.get(file);
  if (hit) return hit;

  const pack = ReferencePackSchema.parse(JSON.parse(readFileSync(file, 'utf8')));
  loaded.set(file, pack);
  return pack;
}
