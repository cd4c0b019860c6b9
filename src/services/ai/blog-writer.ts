import { createLogger } from '../../utils/logger.js';
import { generateWithClaude, isClaudeConfigured } from './clients.js';
import { getTemplate, type BlogTemplate } from './templates.js';
import type { BlogLength, BlogTone, GeneratedBlogPost } from './types.js';

const logger = createLogger('ai:blog-writer');

const MIN_CONTENT_LENGTH = 100;

const LENGTH_GUIDANCE: Record<BlogLength, string> = {
  short: 'approximately 500-700 words',
  medium: 'approximately 1000-1500 words',
  long: 'approximately 2000-2500 words',
};

const RESPONSE_FORMAT = `IMPORTANT: Your response must be in the following format:

---TITLE---
[The blog post title]

---EXCERPT---
[A compelling 1-2 sentence excerpt/summary for previews, max 150 characters]

---META_DESCRIPTION---
[SEO meta description, max 155 characters]

---CONTENT---
[The full blog post content in markdown format]`;

export interface BlogPostOptions {
  tone?: BlogTone;
  length?: BlogLength;
  audience?: string;
  keywords?: string[];
  /** Prompt blocks from FeatureCatalog.formatManyForPrompt. */
  features?: string[];
}

function featuresSection(features: string[]): string {
  return `PRODUCT FEATURES TO HIGHLIGHT:
Mention these features where they genuinely help with the topic:

${features.join('\n---\n')}

How to use the features:
- Present each feature as a solution to a problem the post discusses, not as an advertisement
- When a feature lists screenshots as markdown images, copy those images into the post where that feature is discussed
- Put each screenshot right after the feature is introduced, with a short caption
- Link the feature URL with markdown link syntax when you mention it`;
}

export function buildBlogPrompt(topic: string, template: BlogTemplate, options: BlogPostOptions = {}): string {
  const {
    tone = 'professional',
    length = 'medium',
    audience = 'general business professionals',
    keywords = [],
    features = [],
  } = options;

  const sections = [
    `Write a blog post about: ${topic}`,
    [`Target audience: ${audience}`, `Tone: ${tone}`, `Length: ${LENGTH_GUIDANCE[length]}`].join('\n'),
    keywords.length > 0 ? `Naturally incorporate these keywords where appropriate: ${keywords.join(', ')}.` : '',
    features.length > 0 ? featuresSection(features) : '',
    template.structureGuidance,
    RESPONSE_FORMAT,
  ];

  return sections.filter((section) => section !== '').join('\n\n');
}

function extractSection(content: string, name: string): string | null {
  const pattern = new RegExp(`---${name}---\\s*\\n([\\s\\S]*?)(?=\\n---[A-Z_]+---|$)`);
  const match = pattern.exec(content);
  return match ? match[1].trim() : null;
}

/**
 * Split a sectioned model response into post fields. A response without a
 * usable content section is kept whole as the content.
 */
export function parseBlogResponse(content: string): GeneratedBlogPost {
  const title = extractSection(content, 'TITLE');
  const excerpt = extractSection(content, 'EXCERPT');
  const metaDescription = extractSection(content, 'META_DESCRIPTION');
  const body = extractSection(content, 'CONTENT');

  if (body !== null && body.length > MIN_CONTENT_LENGTH) {
    return {
      title: title ?? 'Untitled',
      excerpt: excerpt ?? body.slice(0, 150),
      metaDescription: metaDescription ?? excerpt ?? body.slice(0, 155),
      content: body,
    };
  }

  logger.warn('Response not in expected format, using raw content', { length: content.length });
  return {
    title: 'Generated Post',
    excerpt: content.slice(0, 150),
    metaDescription: content.slice(0, 155),
    content,
  };
}

export async function generateBlogPost(
  topic: string,
  templateType: string,
  options: BlogPostOptions = {}
): Promise<GeneratedBlogPost> {
  if (!isClaudeConfigured()) {
    throw new Error('Anthropic API key not configured');
  }

  const template = getTemplate(templateType);
  if (!template) {
    throw new Error(`Unknown template type: ${templateType}`);
  }

  const prompt = buildBlogPrompt(topic, template, options);
  const response = await generateWithClaude(prompt, { systemPrompt: template.systemPrompt });

  logger.info('Blog post generated', {
    template: template.name,
    outputTokens: response.usage.outputTokens,
    latencyMs: response.latencyMs,
  });

  return parseBlogResponse(response.text);
}
