import { Marked } from 'marked';

const renderer = new Marked({ gfm: true });

/** Render a post body (metadata already stripped) to HTML. */
export function renderMarkdown(markdown: string): string {
  return renderer.parse(markdown, { async: false });
}
