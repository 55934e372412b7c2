/**
 * Prompt templates per prompt kind.
 *
 * @packageDocumentation
 */

import type { ContentConfig } from '../config/types.js';
import type { GenerationRequest, PromptKind } from './types.js';

interface PromptTemplate {
  /** Context fields that must be present. */
  readonly required: readonly string[];
  /** Builds the prompt body from formatted context values. */
  readonly render: (values: (field: string) => string, content: ContentConfig) => string;
}

const JSON_ONLY = 'Reply with a single JSON object and nothing else.';

const TEMPLATES: Readonly<Record<PromptKind, PromptTemplate>> = {
  question: {
    required: ['initialIdea', 'transcript', 'uncoveredAreas', 'targetArea'],
    render: (v) =>
      [
        `You are brainstorming a social media post with the user about: "${v('initialIdea')}".`,
        'Ask ONE short follow-up question (at most two sentences).',
        "Match the user's tone and energy. Do not explain or summarise.",
        `Focus on: ${v('targetArea')}.`,
        `Areas still open, most important first: ${v('uncoveredAreas')}.`,
        '',
        'Conversation so far:',
        v('transcript'),
      ].join('\n'),
  },
  wrapUp: {
    required: ['initialIdea', 'transcript'],
    render: (v) =>
      [
        `You are brainstorming a social media post with the user about: "${v('initialIdea')}".`,
        'Every topic has been touched on. Ask ONE short wrap-up question: is there anything',
        'they want to add or emphasise before the post is drafted?',
        '',
        'Conversation so far:',
        v('transcript'),
      ].join('\n'),
  },
  brief: {
    required: ['conversation', 'styleProfile'],
    render: (v, content) =>
      [
        'Turn this brainstorming conversation into a content brief.',
        `Default audience: ${content.target_audience}. Usual focus: ${content.content_focus}.`,
        JSON_ONLY,
        'Shape: {"topic": string, "audience": string, "keyMessages": string[] (at least one),',
        '"researchNotes": string[], "personalStory"?: string, "hookPreference"?: string}',
        '',
        'Conversation:',
        v('conversation'),
        '',
        "The user's writing style:",
        v('styleProfile'),
      ].join('\n'),
  },
  hooks: {
    required: ['brief', 'styleProfile', 'hookCount'],
    render: (v) =>
      [
        `Write ${v('hookCount')} opening hooks for the post described in this brief.`,
        "Each hook must sound exactly like the user's own writing.",
        'Mix styles: question, statistic, personal story, contrarian, problem-solution.',
        JSON_ONLY,
        'Shape: {"options": [{"text": string, "style": string, "rationale"?: string}]}',
        '',
        'Brief:',
        v('brief'),
        '',
        "The user's writing style:",
        v('styleProfile'),
      ].join('\n'),
  },
  structure: {
    required: ['brief', 'hookOptions', 'styleProfile'],
    render: (v) =>
      [
        'Outline the post: pick the strongest hook and organise the key messages.',
        JSON_ONLY,
        'Shape: {"format": "bullets" | "numbered" | "prose", "selectedHookIndex": number,',
        '"sections": [{"heading": string, "purpose": string, "points": string[]}],',
        '"callToAction"?: string}',
        '',
        'Brief:',
        v('brief'),
        '',
        'Hook options:',
        v('hookOptions'),
        '',
        "The user's writing style:",
        v('styleProfile'),
      ].join('\n'),
  },
  content: {
    required: ['brief', 'hookOptions', 'structureOutline', 'styleProfile'],
    render: (v) =>
      [
        'Write the final post following the approved outline, opening with the selected hook.',
        "It must be indistinguishable from the user's own writing: same sentence length,",
        'punctuation habits, emoji use, casing and favourite phrases.',
        JSON_ONLY,
        'Shape: {"post": string, "hashtags"?: string[]}',
        '',
        'Brief:',
        v('brief'),
        '',
        'Hook options:',
        v('hookOptions'),
        '',
        'Approved outline:',
        v('structureOutline'),
        '',
        "The user's writing style:",
        v('styleProfile'),
      ].join('\n'),
  },
};

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && value.every((item) => typeof item === 'string')) {
    return value.join(', ');
  }
  return JSON.stringify(value, null, 2);
}

/**
 * Outcome of rendering a prompt.
 */
export type RenderResult =
  | { readonly ok: true; readonly prompt: string }
  | { readonly ok: false; readonly missingFields: readonly string[] };

/**
 * Renders the prompt text for a request.
 *
 * @param request - Prompt kind and context.
 * @param content - Audience and focus settings.
 * @returns The prompt, or the context fields that were missing.
 */
export function renderPrompt(request: GenerationRequest, content: ContentConfig): RenderResult {
  const template = TEMPLATES[request.promptKind];
  const missingFields = template.required.filter(
    (field) => request.context[field] === undefined || request.context[field] === null
  );
  if (missingFields.length > 0) {
    return { ok: false, missingFields };
  }

  const prompt = template.render((field) => formatValue(request.context[field]), content);
  return { ok: true, prompt };
}
