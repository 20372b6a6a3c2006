/**
 * Robots Gate
 * Lazily fetched, per-origin cached robots.txt policy checks (fail-open)
 */

import robotsParser from 'robots-parser';
import { CrawlLogger, silentLogger } from '../logging/logger';
import { RobotsGateConfig, TextLoader } from './crawling.types';

type RobotsPolicy = ReturnType<typeof robotsParser>;

export class RobotsGate {
  private readonly policies: Map<string, Promise<RobotsPolicy | null>> = new Map();

  constructor(
    private readonly config: RobotsGateConfig,
    private readonly loadText: TextLoader,
    private readonly logger: CrawlLogger = silentLogger
  ) {}

  /**
   * Whether the URL may be fetched under its origin's robots policy
   */
  async isAllowed(url: string): Promise<boolean> {
    if (!this.config.respectRobots) {
      return true;
    }

    const policy = await this.policyFor(url);
    if (!policy) {
      return true;
    }

    // undefined means the URL is outside the policy's origin
    return policy.isAllowed(url, this.config.userAgent) !== false;
  }

  /**
   * Crawl-delay declared for our user agent, in milliseconds
   */
  async crawlDelayMs(url: string): Promise<number | null> {
    if (!this.config.respectRobots) {
      return null;
    }

    const policy = await this.policyFor(url);
    const seconds = policy?.getCrawlDelay(this.config.userAgent);
    return typeof seconds === 'number' && seconds > 0 ? Math.round(seconds * 1000) : null;
  }

  /**
   * Number of origins with a cached policy lookup
   */
  cachedOrigins(): number {
    return this.policies.size;
  }

  private policyFor(url: string): Promise<RobotsPolicy | null> {
    let origin: string;
    try {
      origin = new URL(url).origin;
    } catch {
      return Promise.resolve(null);
    }

    const cached = this.policies.get(origin);
    if (cached) {
      return cached;
    }

    const pending = this.loadPolicy(origin);
    this.policies.set(origin, pending);
    return pending;
  }

  private async loadPolicy(origin: string): Promise<RobotsPolicy | null> {
    const robotsUrl = `${origin}/robots.txt`;
    try {
      const body = await this.loadText(robotsUrl);
      if (body === null) {
        this.logger.warn(`[ROBOTS] ${robotsUrl} unavailable, allowing all`);
        return null;
      }
      if (!body.trim()) {
        return null;
      }
      this.logger.info(`[ROBOTS] loaded ${robotsUrl}`);
      return robotsParser(robotsUrl, body);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`[ROBOTS] ${robotsUrl} failed to load (${message}), allowing all`);
      return null;
    }
  }
}
