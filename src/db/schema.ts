import { relations } from 'drizzle-orm';
import { sqliteTable, text, integer, real, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { AUDIENCES, CATEGORIES, INTENTS } from '../services/keywords/types.js';

export const POST_STATUSES = ['draft', 'published'] as const;
export type PostStatus = (typeof POST_STATUSES)[number];

// ============================================================================
// Table 1: blog_authors (lightweight mirror of host-app users)
// ============================================================================
export const blogAuthors = sqliteTable('blog_authors', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  email: text('email').notNull().unique(),
  avatarUrl: text('avatar_url'),
  bio: text('bio'),
  externalId: text('external_id').unique(),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
});

// ============================================================================
// Table 2: blog_posts
// ============================================================================
export const blogPosts = sqliteTable('blog_posts', {
  id: text('id').primaryKey(),
  authorId: text('author_id').notNull().references(() => blogAuthors.id, { onDelete: 'restrict' }),
  title: text('title').notNull(),
  slug: text('slug').notNull().unique(),
  contentMarkdown: text('content_markdown').notNull(),
  contentHtml: text('content_html'),
  excerpt: text('excerpt'),
  status: text('status', { enum: POST_STATUSES }).notNull().default('draft'),
  featuredImageUrl: text('featured_image_url'),
  featuredImageAlt: text('featured_image_alt'),
  metaTitle: text('meta_title'),
  metaDescription: text('meta_description'),
  canonicalUrl: text('canonical_url'),
  publishedAt: text('published_at'),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
}, (table) => ({
  statusIdx: index('blog_posts_status_idx').on(table.status),
  publishedAtIdx: index('blog_posts_published_at_idx').on(table.publishedAt),
}));

// ============================================================================
// Table 3: blog_images (objects in host-provided storage)
// ============================================================================
export const blogImages = sqliteTable('blog_images', {
  id: text('id').primaryKey(),
  authorId: text('author_id').notNull().references(() => blogAuthors.id, { onDelete: 'restrict' }),
  postId: text('post_id').references(() => blogPosts.id, { onDelete: 'set null' }),
  filename: text('filename').notNull(),
  storageKey: text('storage_key').notNull(),
  url: text('url').notNull(),
  contentType: text('content_type').notNull(),
  fileSize: integer('file_size'),
  altText: text('alt_text'),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
});

// ============================================================================
// Table 4: blog_keywords (keyword planner research)
// ============================================================================
export const blogKeywords = sqliteTable('blog_keywords', {
  id: text('id').primaryKey(),
  text: text('keyword').notNull(),
  monthlySearches: integer('monthly_searches'),
  competitionLabel: text('competition'),
  competitionIndex: integer('competition_index'),
  threeMonthChange: text('three_month_change'),
  yoyChange: text('yoy_change'),
  topBidLow: real('top_bid_low'),
  topBidHigh: real('top_bid_high'),
  category: text('category', { enum: CATEGORIES }).notNull(),
  intent: text('intent', { enum: INTENTS }).notNull(),
  isQuestion: integer('is_question', { mode: 'boolean' }).notNull().default(false),
  isBranded: integer('is_branded', { mode: 'boolean' }).notNull().default(false),
  audience: text('audience', { enum: AUDIENCES }).notNull(),
  blogScore: integer('blog_score').notNull().default(0),
  suggestedTopics: text('suggested_topics', { mode: 'json' }).$type<string[]>().notNull().$defaultFn(() => []),
  notes: text('notes'),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
}, (table) => ({
  keywordIdx: uniqueIndex('blog_keywords_keyword_idx').on(table.text),
  categoryIdx: index('blog_keywords_category_idx').on(table.category),
  audienceIdx: index('blog_keywords_audience_idx').on(table.audience),
  blogScoreIdx: index('blog_keywords_blog_score_idx').on(table.blogScore),
}));

// ============================================================================
// Table 5: blog_feature_screenshots (ordered per feature key)
// ============================================================================
export const featureScreenshots = sqliteTable('blog_feature_screenshots', {
  id: text('id').primaryKey(),
  featureKey: text('feature_key').notNull(),
  position: integer('position').notNull().default(0),
  url: text('url').notNull(),
  storageKey: text('storage_key').notNull(),
  altText: text('alt_text'),
  caption: text('caption'),
  stepDescription: text('step_description'),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
}, (table) => ({
  featurePositionIdx: index('blog_feature_screenshots_feature_position_idx').on(table.featureKey, table.position),
}));

// ============================================================================
// Relations
// ============================================================================
export const blogAuthorsRelations = relations(blogAuthors, ({ many }) => ({
  posts: many(blogPosts),
  images: many(blogImages),
}));

export const blogPostsRelations = relations(blogPosts, ({ one, many }) => ({
  author: one(blogAuthors, { fields: [blogPosts.authorId], references: [blogAuthors.id] }),
  images: many(blogImages),
}));

export const blogImagesRelations = relations(blogImages, ({ one }) => ({
  author: one(blogAuthors, { fields: [blogImages.authorId], references: [blogAuthors.id] }),
  post: one(blogPosts, { fields: [blogImages.postId], references: [blogPosts.id] }),
}));
