import { readFile } from 'fs/promises';
import { z } from 'zod';
import { config } from '../../config.js';
import { formatIssues, toFieldIssues } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { listScreenshots, type FeatureScreenshot } from './screenshots.js';

const logger = createLogger('content:features');

export const FeatureSchema = z.object({
  name: z.string(),
  label: z.string(),
  url: z.string(),
  urlNote: z.string().optional(),
  pricing: z.string(),
  description: z.string(),
  useCases: z.array(z.string()).default([]),
  cta: z.string(),
});

export const FeatureFileSchema = z.record(z.string(), FeatureSchema);

export type Feature = z.infer<typeof FeatureSchema>;
export type FeatureMap = Record<string, Feature>;

export interface FeatureOption {
  name: string;
  key: string;
  label: string;
}

export type ScreenshotLoader = (featureKey: string) => Promise<Pick<FeatureScreenshot, 'url' | 'altText' | 'caption' | 'stepDescription'>[]>;

export interface FeatureCatalogOptions {
  filePath?: string;
  loadScreenshots?: ScreenshotLoader;
}

/**
 * Product features read from a JSON file keyed by feature id. The file is
 * read on first use and cached until `reload()`.
 */
export class FeatureCatalog {
  private readonly filePath: string;
  private readonly loadScreenshots: ScreenshotLoader;
  private cache: Promise<FeatureMap> | null = null;

  constructor(options: FeatureCatalogOptions = {}) {
    this.filePath = options.filePath ?? config.content.featuresFile;
    this.loadScreenshots = options.loadScreenshots ?? listScreenshots;
  }

  async all(): Promise<FeatureMap> {
    this.cache ??= this.load();
    return this.cache;
  }

  async get(key: string): Promise<Feature | null> {
    const features = await this.all();
    return Object.hasOwn(features, key) ? features[key] : null;
  }

  async options(): Promise<FeatureOption[]> {
    const features = await this.all();
    return Object.entries(features)
      .map(([key, feature]) => ({ name: feature.name, key, label: feature.label }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async reload(): Promise<FeatureMap> {
    this.cache = null;
    return this.all();
  }

  /**
   * Feature details as a prompt block, followed by its screenshots as
   * numbered steps when it has any. Null for an unknown key.
   */
  async formatForPrompt(key: string): Promise<string | null> {
    const feature = await this.get(key);
    if (!feature) return null;

    const urlText = feature.urlNote ? `${feature.url} (${feature.urlNote})` : feature.url;
    const lines = [
      `**${feature.name}**`,
      `URL: ${urlText}`,
      `Pricing: ${feature.pricing}`,
      feature.description,
      'Use cases:',
      ...feature.useCases.map((useCase) => `  * ${useCase}`),
      `Suggested CTA: ${feature.cta}`,
    ];

    const screenshots = await this.loadScreenshots(key);
    if (screenshots.length > 0) {
      lines.push('', 'SCREENSHOTS (include these in the blog to show the workflow):');
      screenshots.forEach((screenshot, index) => {
        const step = index + 1;
        const altText = screenshot.altText ?? '';
        lines.push(
          screenshot.stepDescription ? `Step ${step}: ${screenshot.stepDescription}` : `Step ${step}`,
          `![${altText}](${screenshot.url})`,
          `*${screenshot.caption ?? altText}*`
        );
      });
    }

    return lines.join('\n');
  }

  async formatManyForPrompt(keys: string[]): Promise<string[]> {
    const blocks: string[] = [];
    for (const key of keys) {
      const block = await this.formatForPrompt(key);
      if (block !== null) blocks.push(block);
    }
    return blocks;
  }

  private async load(): Promise<FeatureMap> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      logger.warn('Failed to read features file', {
        filePath: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return {};
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      logger.error('Failed to parse features file', {
        filePath: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return {};
    }

    const parsed = FeatureFileSchema.safeParse(json);
    if (!parsed.success) {
      logger.error('Features file does not match the expected shape', {
        filePath: this.filePath,
        error: formatIssues(toFieldIssues(parsed.error.issues)),
      });
      return {};
    }

    logger.debug('Loaded features', { count: Object.keys(parsed.data).length });
    return parsed.data;
  }
}
