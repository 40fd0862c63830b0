import type { VideoSummary } from '../../domain/VideoSummary';

/**
* Adapter interface for the note store that receives each summary as a page
*/
export interface NoteClient {
  /**
  * Create a page for the summary
  * @returns URL of the created page
  * @throws NoteServiceError when the page cannot be created
  */
  createPage(summary: VideoSummary): Promise<string>;
}
