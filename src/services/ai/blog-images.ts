import { generateImage } from './clients.js';
import type { AspectRatio, BlogTone, GeneratedImage } from './types.js';

export interface BlogImageOptions {
  tone?: BlogTone;
  aspectRatio?: AspectRatio;
  /** Generated post title; preferred over the topic as the subject. */
  title?: string;
  excerpt?: string;
}

const STYLE_BY_TONE: Partial<Record<BlogTone, string>> = {
  casual: 'friendly and approachable',
  friendly: 'warm and inviting',
  authoritative: 'bold and professional',
  conversational: 'natural and relatable',
};

const DEFAULT_STYLE = 'clean and professional';

export function buildBlogImagePrompt(topic: string, options: BlogImageOptions = {}): string {
  const style = (options.tone && STYLE_BY_TONE[options.tone]) ?? DEFAULT_STYLE;
  const subject = options.title ?? topic;

  const lines = [`Create a ${style} blog header image for an article titled: "${subject}"`];
  if (options.excerpt) {
    lines.push(`Context: ${options.excerpt}`);
  }
  lines.push(
    '',
    'Style requirements:',
    '- Modern, uncluttered design suited to a business blog',
    '- Abstract or conceptual imagery with no text or lettering',
    '- Professional color palette',
    '- High quality and suitable for the web',
    '- Understated rather than cartoonish',
    '- Visually related to the article topic'
  );

  return lines.join('\n');
}

export async function generateBlogImage(topic: string, options: BlogImageOptions = {}): Promise<GeneratedImage> {
  return generateImage(buildBlogImagePrompt(topic, options), {
    aspectRatio: options.aspectRatio ?? '16:9',
  });
}
