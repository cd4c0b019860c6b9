import { unified } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import remarkRehype from 'remark-rehype';
import rehypeStringify from 'rehype-stringify';

export interface MarkdownRenderer {
  render(markdown: string): Promise<string>;
}

// Raw HTML in the source is dropped: remark-rehype runs without allowDangerousHtml.
const processor = unified()
  .use(remarkParse)
  .use(remarkGfm)
  .use(remarkRehype)
  .use(rehypeStringify);

export const markdownRenderer: MarkdownRenderer = {
  async render(markdown) {
    const file = await processor.process(markdown);
    return String(file);
  },
};
