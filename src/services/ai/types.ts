export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface AIResponse {
  text: string;
  usage: TokenUsage;
  model: string;
  finishReason?: string;
  latencyMs?: number;
}

export interface GenerateOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
}

export const ASPECT_RATIOS = ['1:1', '3:4', '4:3', '16:9', '9:16'] as const;
export type AspectRatio = (typeof ASPECT_RATIOS)[number];

export interface ImageOptions {
  aspectRatio?: AspectRatio;
}

export interface GeneratedImage {
  imageData: Buffer;
  mimeType: string;
  model: string;
  latencyMs?: number;
}

export const BLOG_TONES = ['professional', 'casual', 'friendly', 'authoritative', 'conversational'] as const;
export type BlogTone = (typeof BLOG_TONES)[number];

export const BLOG_LENGTHS = ['short', 'medium', 'long'] as const;
export type BlogLength = (typeof BLOG_LENGTHS)[number];

export interface GeneratedBlogPost {
  title: string;
  excerpt: string;
  metaDescription: string;
  content: string;
}
