import { Logger } from '@nestjs/common';
import { FilterRule } from '../domain/models';
import { StorageAdapter } from '../interfaces';
import { LinkExpander } from './link-expander';
import { PatternCache } from './pattern-cache';

/**
 * Ordered rewrite rules over message text
 *
 * Rules are read from the store on every call so admin edits apply to the
 * next message. The store lock is only held for that read; network
 * expansion runs outside it.
 */
export class LinkFilterChain {
  private readonly logger = new Logger(LinkFilterChain.name);
  private readonly patterns = new PatternCache(this.logger, 'Filter rule');

  constructor(
    private readonly storage: StorageAdapter,
    private readonly expander: LinkExpander,
  ) {}

  async apply(text: string): Promise<string> {
    if (!text) {
      return text;
    }

    const rules = await this.storage.listFilters();
    let current = text;

    for (const rule of rules) {
      const regex = this.patterns.get(rule.pattern);
      if (!regex) {
        continue;
      }

      try {
        current = rule.isLinkExpansion()
          ? await this.expandLinks(current, regex)
          : this.substitute(current, rule, regex);
      } catch (error) {
        this.logger.error(
          `Filter ${rule.id} '${rule.pattern}' failed: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    return current;
  }

  private async expandLinks(text: string, regex: RegExp): Promise<string> {
    const urls = new Set<string>();
    for (const match of text.matchAll(regex)) {
      if (match[0]) {
        urls.add(match[0]);
      }
    }

    let current = text;
    for (const url of urls) {
      const finalUrl = await this.expander.expand(url);
      if (finalUrl !== url) {
        current = current.split(url).join(finalUrl);
        this.logger.log(`Expanded ${url} -> ${finalUrl}`);
      }
    }
    return current;
  }

  private substitute(text: string, rule: FilterRule, regex: RegExp): string {
    const replaced = text.replace(regex, rule.replacement);
    if (replaced !== text) {
      this.logger.log(`Filter matched: '${rule.pattern}'`);
    }
    return replaced;
  }
}
