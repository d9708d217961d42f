import type { Logger } from 'pino';
import { z } from 'zod';
import { VideoMetadata } from '../types/pipeline.js';

export const MAX_TITLE_LENGTH = 100;
export const MAX_TAGS = 10;

// Emoticons, pictographs, transport/map symbols, flags, dingbats, variation selectors.
const EMOJI_PATTERN =
  /[\u{1F600}-\u{1F64F}\u{1F300}-\u{1F5FF}\u{1F680}-\u{1F6FF}\u{1F1E0}-\u{1F1FF}\u{1F900}-\u{1F9FF}\u{2702}-\u{27B0}\u{FE0F}\u{200D}]/gu;

const metadataResponseSchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  tags: z.array(z.string()).optional()
});

export function buildVideoPromptRequest(instructions: string): string {
  return `You are an AI agent responsible for generating creative video prompts for an AI video generation model.

Custom Instructions: ${instructions}

Generate a single, detailed video prompt that:
1. Is engaging and suitable for YouTube
2. Is visually interesting and cinematic
3. Has clear narrative or visual progression
4. Is appropriate for a 30-60 second video
5. Avoids copyright issues or controversial content

Return ONLY the video prompt, nothing else. Make it detailed and descriptive.`;
}

export function buildMetadataRequest(videoPrompt: string): string {
  return `You are an AI agent creating YouTube metadata for a video.

Video Prompt: ${videoPrompt}

Generate appropriate YouTube metadata in the following JSON format:
{
  "title": "An engaging, SEO-friendly title (max 100 characters)",
  "description": "A detailed description with relevant information and keywords",
  "tags": ["tag1", "tag2", "tag3", "tag4", "tag5"]
}

Make the title catchy and click-worthy while being accurate.
Include relevant hashtags and keywords in the description.
Choose 5-10 relevant tags.

Return ONLY valid JSON, nothing else.`;
}

export function sanitizeText(text: string): string {
  return text.replace(EMOJI_PATTERN, '').replace(/[ \t]{2,}/g, ' ').trim();
}

function stripCodeFences(text: string): string {
  return text.replace(/^```[a-zA-Z]*\s*/m, '').replace(/```\s*$/m, '').trim();
}

/** Normalise a model's free-text answer into a bare prompt. */
export function cleanVideoPrompt(text: string): string {
  let prompt = sanitizeText(stripCodeFences(text));
  prompt = prompt.replace(/^(video\s+)?prompt\s*:\s*/i, '');
  if (prompt.length >= 2 && /^["'].*["']$/s.test(prompt)) {
    prompt = prompt.slice(1, -1).trim();
  }
  return prompt;
}

export function fallbackMetadata(videoPrompt: string): VideoMetadata {
  return {
    title: 'AI Generated Video',
    description: `Video generated using AI: ${sanitizeText(videoPrompt)}`,
    tags: ['AI', 'Generated', 'Video', 'Sora']
  };
}

export function truncateTitle(title: string, max: number = MAX_TITLE_LENGTH): string {
  if (title.length <= max) return title;
  return title.slice(0, max - 3).trimEnd() + '...';
}

/**
 * Parse the metadata JSON a model returned. Anything unusable falls back to generic
 * metadata built from the prompt.
 */
export function parseMetadataResponse(text: string, videoPrompt: string, logger?: Logger): VideoMetadata {
  const cleaned = sanitizeText(stripCodeFences(text));
  const jsonMatch = cleaned.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    logger?.warn({ response: cleaned.slice(0, 200) }, 'Metadata response contained no JSON, using fallback');
    return fallbackMetadata(videoPrompt);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(jsonMatch[0]);
  } catch (error) {
    logger?.warn({ error: error instanceof Error ? error.message : String(error) }, 'Metadata JSON did not parse, using fallback');
    return fallbackMetadata(videoPrompt);
  }

  const parsed = metadataResponseSchema.safeParse(raw);
  if (!parsed.success) {
    logger?.warn('Metadata JSON had an unexpected shape, using fallback');
    return fallbackMetadata(videoPrompt);
  }

  const fallback = fallbackMetadata(videoPrompt);
  const title = sanitizeText(parsed.data.title ?? '');
  const tags = (parsed.data.tags ?? [])
    .map((tag) => sanitizeText(tag))
    .filter((tag) => tag.length > 0)
    .slice(0, MAX_TAGS);

  return {
    title: title ? truncateTitle(title) : fallback.title,
    description: sanitizeText(parsed.data.description ?? ''),
    tags
  };
}
