import { Logger } from '@nestjs/common';
import { normalizeCode } from '../domain/models';
import { PatternCache } from '../filters/pattern-cache';

/**
 * Pulls content fingerprints out of (already filtered) message text
 *
 * The pattern is supplied by a getter and looked up on every call, so a
 * changed setting applies to the next message. When the pattern has a
 * capture group, group 1 is the code; otherwise the whole match is.
 */
export class CodeExtractor {
  private readonly logger = new Logger(CodeExtractor.name);
  private readonly patterns = new PatternCache(this.logger, 'Duplicate code extraction');

  constructor(private readonly patternSource: () => string) {}

  /**
   * Ordered, de-duplicated list of normalized codes
   * Empty when the text is empty or the pattern is invalid or unreadable
   */
  extract(text: string | null | undefined): string[] {
    if (!text) {
      return [];
    }

    const regex = this.currentPattern();
    if (!regex) {
      return [];
    }

    const codes = new Set<string>();
    for (const match of text.matchAll(regex)) {
      const raw = match.length > 1 && match[1] !== undefined ? match[1] : match[0];
      const code = normalizeCode(raw);
      if (code) {
        codes.add(code);
      }
    }
    return [...codes];
  }

  private currentPattern(): RegExp | null {
    let source: string;
    try {
      source = this.patternSource();
    } catch (error) {
      this.logger.error(
        `Duplicate code pattern unreadable, extraction disabled: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
    return this.patterns.get(source);
  }
}
