// Library entry point. Hosts call initializeDatabase() once at startup, then
// use the services below.

export { config, validateConfig } from './config.js';
export { initializeDatabase, getDatabase, closeDatabase, type InkpressDatabase } from './db/index.js';
export { createLogger, Logger } from './utils/logger.js';
export { ValidationError, NotFoundError, type FieldIssue } from './utils/errors.js';

// Keywords
export * from './services/keywords/types.js';
export {
  classifyKeyword,
  detectAudience,
  detectCategory,
  detectIntent,
  isBranded,
  isLowValueKeyword,
  isQuestion,
  type Classification,
} from './services/keywords/classifier.js';
export { computeBlogScore, scoreBreakdown, type ScoreBreakdown, type ScoringInput } from './services/keywords/scorer.js';
export { buildKeyword, deriveKeyword, KeywordInputSchema, type KeywordInput } from './services/keywords/keyword.js';
export { keywordStore, type KeywordStore, type InsertResult, type UpdateResult } from './services/keywords/store.js';
export * from './services/keywords/queries.js';
export { parseCsv } from './services/keywords/csv/parse.js';
export { decodeToText } from './services/keywords/csv/decode.js';
export {
  importFromContent,
  importFromFile,
  type ImportFailure,
  type ImportOutcome,
  type ImportResult,
} from './services/keywords/csv/importer.js';

// Blog
export * from './services/blog/authors.js';
export * from './services/blog/posts.js';
export * from './services/blog/images.js';
export * from './services/blog/storage.js';
export { markdownRenderer, type MarkdownRenderer } from './services/blog/markdown.js';

// Content
export * from './services/content/features.js';
export * from './services/content/screenshots.js';

// AI
export {
  generateImage,
  generateWithClaude,
  isClaudeConfigured,
  isImagenConfigured,
} from './services/ai/clients.js';
export * from './services/ai/templates.js';
export { buildBlogPrompt, generateBlogPost, parseBlogResponse, type BlogPostOptions } from './services/ai/blog-writer.js';
export { buildBlogImagePrompt, generateBlogImage, type BlogImageOptions } from './services/ai/blog-images.js';
export * from './services/ai/types.js';
