import { describe, it, expect, vi, beforeEach } from 'vitest';

const clients = vi.hoisted(() => ({ generateImage: vi.fn() }));

vi.mock('../../../src/services/ai/clients.js', () => clients);

import { buildBlogImagePrompt, generateBlogImage } from '../../../src/services/ai/blog-images.js';

const STYLE_REQUIREMENTS = [
  '',
  'Style requirements:',
  '- Modern, uncluttered design suited to a business blog',
  '- Abstract or conceptual imagery with no text or lettering',
  '- Professional color palette',
  '- High quality and suitable for the web',
  '- Understated rather than cartoonish',
  '- Visually related to the article topic',
];

describe('buildBlogImagePrompt', () => {
  it('uses the title and excerpt when given', () => {
    expect(
      buildBlogImagePrompt('trade show networking', {
        tone: 'friendly',
        title: 'Ten Ways to Work a Booth',
        excerpt: 'Practical booth tips.',
      })
    ).toBe(
      [
        'Create a warm and inviting blog header image for an article titled: "Ten Ways to Work a Booth"',
        'Context: Practical booth tips.',
        ...STYLE_REQUIREMENTS,
      ].join('\n')
    );
  });

  it('falls back to the topic and the default style', () => {
    expect(buildBlogImagePrompt('trade show networking')).toBe(
      [
        'Create a clean and professional blog header image for an article titled: "trade show networking"',
        ...STYLE_REQUIREMENTS,
      ].join('\n')
    );
  });

  it.each([
    ['casual', 'friendly and approachable'],
    ['authoritative', 'bold and professional'],
    ['conversational', 'natural and relatable'],
    ['professional', 'clean and professional'],
  ] as const)('maps the %s tone to a %s style', (tone, style) => {
    expect(buildBlogImagePrompt('topic', { tone }).split('\n')[0]).toBe(
      `Create a ${style} blog header image for an article titled: "topic"`
    );
  });
});

describe('generateBlogImage', () => {
  beforeEach(() => {
    clients.generateImage.mockReset();
    clients.generateImage.mockResolvedValue({
      imageData: Buffer.from('png'),
      mimeType: 'image/png',
      model: 'test-model',
    });
  });

  it('requests a wide image by default', async () => {
    await generateBlogImage('trade show networking');

    expect(clients.generateImage).toHaveBeenCalledWith(buildBlogImagePrompt('trade show networking'), {
      aspectRatio: '16:9',
    });
  });

  it('passes a chosen aspect ratio through', async () => {
    const image = await generateBlogImage('topic', { aspectRatio: '1:1' });

    expect(clients.generateImage).toHaveBeenCalledWith(expect.any(String), { aspectRatio: '1:1' });
    expect(image.mimeType).toBe('image/png');
  });
});
