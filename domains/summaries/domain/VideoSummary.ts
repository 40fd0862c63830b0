import { z } from 'zod';

/**
* Video Summary
*
* Structured digest of one video as produced by the summarization model, or the
* raw model output when it could not be read as the expected JSON document.
*/

// ============================================================================
// Schema
// ============================================================================

export const UNTITLED_VIDEO = 'Untitled Video';

const ToolUsageSchema = z.union([
  z.object({
    tool: z.string(),
    purpose: z.string().optional().transform(p => p ?? ''),
  }),
  z.string().transform(tool => ({ tool, purpose: '' })),
]);

const TextItemSchema = z.union([z.string(), z.number()]).transform(String);

/** Shape requested from the model; missing fields fall back to empty values */
const ModelSummarySchema = z.object({
  title: z.string().optional().transform(t => t?.trim() || UNTITLED_VIDEO),
  tags: z.array(TextItemSchema).default([]).transform(tags => tags.map(t => t.trim()).filter(Boolean)),
  brief_summary: z.string().default(''),
  summary_bullets: z.array(TextItemSchema).default([]),
  tools_and_technologies: z.array(ToolUsageSchema).default([]),
});

// ============================================================================
// Types
// ============================================================================

export interface ToolUsage {
  tool: string;
  purpose: string;
}

export interface StructuredSummary {
  title: string;
  tags: string[];
  /** Canonical URL of the summarized video */
  url: string;
  brief_summary: string;
  summary_bullets: string[];
  tools_and_technologies: ToolUsage[];
}

/** Model output that could not be read as a structured summary */
export interface RawSummary {
  raw_response: string;
  note: string;
}

export type VideoSummary = StructuredSummary | RawSummary;

export function isRawSummary(summary: VideoSummary): summary is RawSummary {
  return 'raw_response' in summary;
}

/** Title to show for any summary */
export function summaryTitle(summary: VideoSummary): string {
  return isRawSummary(summary) ? UNTITLED_VIDEO : summary.title;
}

// ============================================================================
// Parsing
// ============================================================================

/**
* Pull the JSON document out of model output: the body of the first ```json
* fence, else of the first bare ``` fence, else the whole text.
*/
export function extractJsonText(text: string): string {
  for (const fence of ['```json', '```']) {
    const start = text.indexOf(fence);
    if (start === -1) continue;

    const bodyStart = start + fence.length;
    const end = text.indexOf('```', bodyStart);
    return (end === -1 ? text.slice(bodyStart) : text.slice(bodyStart, end)).trim();
  }
  return text.trim();
}

/**
* Parse model output into a summary for the given video.
* The URL is always the canonical one the model was given, never the model's echo.
*/
export function parseSummaryResponse(text: string, canonicalUrl: string): VideoSummary {
  let json: unknown;
  try {
    json = JSON.parse(extractJsonText(text));
  } catch {
    return { raw_response: text, note: 'Response was not in expected JSON format' };
  }

  const result = ModelSummarySchema.safeParse(json);
  if (!result.success) {
    return { raw_response: text, note: 'Response did not match the expected summary structure' };
  }

  return { ...result.data, url: canonicalUrl };
}
