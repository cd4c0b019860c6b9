import { describe, it, expect, vi, beforeEach } from 'vitest';

const clients = vi.hoisted(() => ({
  isClaudeConfigured: vi.fn(() => true),
  generateWithClaude: vi.fn(),
}));

vi.mock('../../../src/services/ai/clients.js', () => clients);

import {
  buildBlogPrompt,
  generateBlogPost,
  parseBlogResponse,
} from '../../../src/services/ai/blog-writer.js';
import { getTemplate, type BlogTemplate } from '../../../src/services/ai/templates.js';

function template(name: string): BlogTemplate {
  const found = getTemplate(name);
  if (!found) throw new Error(`missing template ${name}`);
  return found;
}

const BODY = `## Intro\n\n${'Follow up within a day. '.repeat(10).trim()}`;

const SECTIONED = [
  '---TITLE---',
  'Ten Ways to Follow Up',
  '',
  '---EXCERPT---',
  'Short excerpt.',
  '',
  '---META_DESCRIPTION---',
  'Meta text.',
  '',
  '---CONTENT---',
  BODY,
].join('\n');

describe('buildBlogPrompt', () => {
  const tips = template('tips_list');

  it('starts with the topic and audience block', () => {
    const prompt = buildBlogPrompt('networking at trade shows', tips, {
      tone: 'friendly',
      length: 'short',
      audience: 'event planners',
      keywords: ['trade show tips', 'booth ideas'],
    });

    expect(
      prompt.startsWith(
        [
          'Write a blog post about: networking at trade shows',
          'Target audience: event planners\nTone: friendly\nLength: approximately 500-700 words',
          'Naturally incorporate these keywords where appropriate: trade show tips, booth ideas.',
          tips.structureGuidance,
          'IMPORTANT: Your response must be in the following format:',
        ].join('\n\n')
      )
    ).toBe(true);
    expect(prompt.endsWith('---CONTENT---\n[The full blog post content in markdown format]')).toBe(true);
  });

  it('fills defaults and leaves out empty sections', () => {
    const prompt = buildBlogPrompt('card design', tips);

    expect(prompt.split('\n\n').slice(0, 3)).toEqual([
      'Write a blog post about: card design',
      'Target audience: general business professionals\nTone: professional\nLength: approximately 1000-1500 words',
      tips.structureGuidance.split('\n\n')[0],
    ]);
    expect(prompt).not.toContain('Naturally incorporate');
    expect(prompt).not.toContain('PRODUCT FEATURES TO HIGHLIGHT');
  });

  it('joins feature blocks with separators', () => {
    const prompt = buildBlogPrompt('card design', tips, { features: ['**QR Code Cards**', '**Card Scanner**'] });

    expect(prompt).toContain('PRODUCT FEATURES TO HIGHLIGHT:');
    expect(prompt).toContain('**QR Code Cards**\n---\n**Card Scanner**');
  });
});

describe('parseBlogResponse', () => {
  it('splits a sectioned response', () => {
    expect(parseBlogResponse(SECTIONED)).toEqual({
      title: 'Ten Ways to Follow Up',
      excerpt: 'Short excerpt.',
      metaDescription: 'Meta text.',
      content: BODY,
    });
  });

  it('derives missing fields from the content', () => {
    expect(parseBlogResponse(`---CONTENT---\n${BODY}`)).toEqual({
      title: 'Untitled',
      excerpt: BODY.slice(0, 150),
      metaDescription: BODY.slice(0, 155),
      content: BODY,
    });
  });

  it('uses the excerpt as the meta description when that is missing', () => {
    const parsed = parseBlogResponse(`---EXCERPT---\nShort excerpt.\n---CONTENT---\n${BODY}`);
    expect(parsed.metaDescription).toBe('Short excerpt.');
  });

  it('keeps a short or unsectioned response whole', () => {
    const raw = '---TITLE---\nHi\n---CONTENT---\nToo short';

    expect(parseBlogResponse(raw)).toEqual({
      title: 'Generated Post',
      excerpt: raw,
      metaDescription: raw,
      content: raw,
    });
    expect(parseBlogResponse('Just some prose.').title).toBe('Generated Post');
  });
});

describe('generateBlogPost', () => {
  beforeEach(() => {
    clients.isClaudeConfigured.mockReturnValue(true);
    clients.generateWithClaude.mockReset();
  });

  it('sends the built prompt with the template system prompt and parses the reply', async () => {
    clients.generateWithClaude.mockResolvedValue({
      text: SECTIONED,
      usage: { inputTokens: 10, outputTokens: 20, totalTokens: 30 },
      model: 'test-model',
      latencyMs: 5,
    });
    const options = { tone: 'casual' as const, keywords: ['follow up email'] };

    const post = await generateBlogPost('following up after events', 'how_to', options);

    const howTo = template('how_to');
    expect(clients.generateWithClaude).toHaveBeenCalledWith(
      buildBlogPrompt('following up after events', howTo, options),
      { systemPrompt: howTo.systemPrompt }
    );
    expect(post.title).toBe('Ten Ways to Follow Up');
  });

  it('refuses to run without an API key', async () => {
    clients.isClaudeConfigured.mockReturnValue(false);

    await expect(generateBlogPost('topic', 'how_to')).rejects.toThrow('Anthropic API key not configured');
    expect(clients.generateWithClaude).not.toHaveBeenCalled();
  });

  it('rejects unknown templates', async () => {
    await expect(generateBlogPost('topic', 'listicle')).rejects.toThrow('Unknown template type: listicle');
  });

  it('passes generation failures through', async () => {
    clients.generateWithClaude.mockRejectedValue(new Error('Rate limited - please try again later'));

    await expect(generateBlogPost('topic', 'tips_list')).rejects.toThrow('Rate limited - please try again later');
  });
});
