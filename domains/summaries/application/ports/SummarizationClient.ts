import type { VideoSummary } from '../../domain/VideoSummary';

/**
* Adapter interface for the video summarization model.
*
* @example
* ```typescript
* const summary = await client.summarize('https://www.youtube.com/watch?v=dQw4w9WgXcQ');
* if (!isRawSummary(summary)) {
*   console.log(summary.title);
* }
* ```
*/
export interface SummarizationClient {
  /**
  * Summarize one video
  *
  * @param canonicalUrl - Validated, canonical video URL
  * @throws SummarizationError when the model call fails or returns nothing
  */
  summarize(canonicalUrl: string): Promise<VideoSummary>;
}
