import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { IModelCatalog, IModelLocator } from '../domain/ports';
import { findModel } from '../domain/whisperModels';
import { errorMessage } from '../domain/errors';

export const MANIFEST_FILE = 'manifest.json';

const manifestSchema = z.object({
  models: z.record(z.string(), z.object({ checksum: z.string().optional() }).passthrough())
});

/**
 * Models installed under one directory.
 * A model is available when its file exists; checksums come from the
 * directory's manifest.json, written by whatever installed the models.
 */
export class FileModelCatalog implements IModelCatalog, IModelLocator {
  constructor(private readonly modelsDir: string | (() => string)) { }

  public pathFor(modelId: string): string {
    const fileName = findModel(modelId)?.fileName ?? modelId;
    return path.join(this.directory(), fileName);
  }

  public isAvailable(modelId: string): boolean {
    return fs.existsSync(this.pathFor(modelId));
  }

  public checksum(modelId: string): string | undefined {
    return this.readManifest()?.models[modelId]?.checksum;
  }

  private directory(): string {
    return typeof this.modelsDir === 'function' ? this.modelsDir() : this.modelsDir;
  }

  private readManifest(): z.output<typeof manifestSchema> | undefined {
    const manifestPath = path.join(this.directory(), MANIFEST_FILE);
    if (!fs.existsSync(manifestPath)) return undefined;

    try {
      const parsed = manifestSchema.safeParse(JSON.parse(fs.readFileSync(manifestPath, 'utf-8')));
      if (parsed.success) return parsed.data;
      console.warn(`⚠️ [Models] Ignoring malformed ${MANIFEST_FILE}`);
    } catch (error) {
      console.warn(`⚠️ [Models] Could not read ${MANIFEST_FILE}: ${errorMessage(error)}`);
    }
    return undefined;
  }
}
