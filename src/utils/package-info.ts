/**
 * Server identity (name and version) read from the package manifest
 */

import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

// src/utils/ and dist/utils/ both sit two levels below the package root
const PACKAGE_JSON_PATH = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');

const PackageManifestSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
});

export type ServerIdentity = z.infer<typeof PackageManifestSchema>;

let cachedIdentity: ServerIdentity | null = null;

export function getServerIdentity(): ServerIdentity {
  if (cachedIdentity === null) {
    const manifest: unknown = JSON.parse(readFileSync(PACKAGE_JSON_PATH, 'utf-8'));
    const { name, version } = PackageManifestSchema.parse(manifest);
    cachedIdentity = { name, version };
  }
  return cachedIdentity;
}
