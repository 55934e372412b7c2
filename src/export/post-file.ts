/**
 * Writes the finished post to disk as Markdown.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import { dirname } from 'node:path';
import { getPayload } from '../bundle/bundle.js';
import type { FinalContent } from '../bundle/types.js';
import { InvalidTransitionError } from '../errors.js';
import type { PipelineRun } from '../pipeline/types.js';
import { safeMkdir, safeWriteFileAtomic } from '../utils/safe-fs.js';

/**
 * Renders the post body followed by its hashtags on one line.
 */
export function renderPostMarkdown(content: FinalContent): string {
  const body = content.post.trim();
  const hashtags = content.hashtags ?? [];
  if (hashtags.length === 0) {
    return `${body}\n`;
  }
  return `${body}\n\n${hashtags.join(' ')}\n`;
}

/**
 * Writes the final content of a succeeded run.
 *
 * @returns The rendered Markdown.
 * @throws InvalidTransitionError if the run has no final content yet.
 */
export async function writePostFile(run: PipelineRun, filePath: string): Promise<string> {
  const content = getPayload(run.bundle, 'finalContent');
  if (run.state !== 'Succeeded' || content === undefined) {
    throw new InvalidTransitionError(`Run '${run.id}' has no final post: it is ${run.state}`, {
      fromState: run.state,
      operation: 'exportPost',
      entityId: run.id,
    });
  }
  const markdown = renderPostMarkdown(content);
  await safeMkdir(dirname(filePath));
  await safeWriteFileAtomic(filePath, markdown, randomUUID());
  return markdown;
}
