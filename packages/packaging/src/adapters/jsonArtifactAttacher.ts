/**
 * JSON Artifact Attacher
 * 
 * Records attached archives in a JSON file so a later build step can pick
 * them up. One record per classifier; attaching again replaces it.
 */

import { z } from 'zod';
import { ConfigurationError, type ArtifactAttacher } from '@jarsmith/core';
import { safeReadFile, safeWriteFile } from '@jarsmith/utils';

const attachedArtifactSchema = z.object({
  file: z.string(),
  classifier: z.string(),
  type: z.literal('jar'),
  attachedAt: z.string(),
});

const attachmentRecordSchema = z.object({
  artifacts: z.array(attachedArtifactSchema),
});

export type AttachedArtifact = z.infer<typeof attachedArtifactSchema>;

export class JsonArtifactAttacher implements ArtifactAttacher {
  constructor(
    readonly recordPath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async attach(file: string, classifier: string): Promise<void> {
    const artifacts = (await this.list()).filter((artifact) => artifact.classifier !== classifier);
    artifacts.push({ file, classifier, type: 'jar', attachedAt: this.now().toISOString() });
    await safeWriteFile(this.recordPath, `${JSON.stringify({ artifacts }, null, 2)}\n`);
  }

  async list(): Promise<AttachedArtifact[]> {
    const content = await safeReadFile(this.recordPath);
    if (content === null) {
      return [];
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Attachment record ${this.recordPath} is not valid JSON`, {
        recordPath: this.recordPath,
      }, error);
    }

    const parsed = attachmentRecordSchema.safeParse(data);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid attachment record ${this.recordPath}`, {
        recordPath: this.recordPath,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    return parsed.data.artifacts;
  }
}
