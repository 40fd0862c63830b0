/**
* Prompt sent with each video to the summarization model
*/

const RESPONSE_SHAPE = `{
  "title": "Video title",
  "tags": ["tag1", "tag2", "tag3"],
  "url": "<video url>",
  "brief_summary": "Two or three sentences describing what the video covers",
  "summary_bullets": ["Key point 1", "Key point 2", "Key point 3"],
  "tools_and_technologies": [
    {"tool": "Tool name", "purpose": "What it is used for in the video"}
  ]
}`;

/**
* Build the summarization prompt for one video.
* The model answers in Spanish for Spanish-language videos and in English otherwise.
*/
export function buildSummaryPrompt(url: string): string {
  return [
    'Watch this YouTube video and produce a structured summary.',
    '',
    'Answer with a single JSON object of exactly this shape:',
    RESPONSE_SHAPE.replace('<video url>', url),
    '',
    'Rules:',
    '- Write every field in Spanish if the video is in Spanish, otherwise in English.',
    '- Keep the summary informative and actionable.',
    '- List the main takeaways in summary_bullets.',
    '- Use an empty array for tools_and_technologies when the video mentions none.',
    '- Return only the JSON object, with no text before or after it.',
  ].join('\n');
}
