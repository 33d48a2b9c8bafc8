import { Logger } from '@nestjs/common';
import { InvalidPatternError } from '../errors';

const MAX_CACHED_PATTERNS = 256;

/**
 * Compile a user-supplied pattern for global matching
 * @throws InvalidPatternError when the source does not compile
 */
export function compilePattern(source: string, flags = 'g'): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidPatternError(`Invalid pattern '${source}': ${reason}`, source);
  }
}

export function isValidPattern(source: string): boolean {
  try {
    compilePattern(source);
    return true;
  } catch {
    return false;
  }
}

/**
 * Compiled patterns keyed by source
 *
 * An uncompilable source is remembered as disabled and logged once, so the
 * hot path never sees a compile error.
 */
export class PatternCache {
  private readonly compiled = new Map<string, RegExp | null>();

  constructor(
    private readonly logger: Logger,
    private readonly label: string,
  ) {}

  get(source: string): RegExp | null {
    const cached = this.compiled.get(source);
    if (cached !== undefined) {
      return cached;
    }

    if (this.compiled.size >= MAX_CACHED_PATTERNS) {
      this.compiled.clear();
    }

    let regex: RegExp | null = null;
    try {
      regex = compilePattern(source);
    } catch (error) {
      this.logger.error(
        `${this.label} disabled: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    this.compiled.set(source, regex);
    return regex;
  }
}
