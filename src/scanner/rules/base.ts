import { extname } from 'node:path';
import { RuleEvaluationError } from '../../errors.js';
import type { Rule, RuleMatch, Severity } from '../../types.js';
import { codeOf, isCommentLine } from '../primitives.js';

export const KOTLIN = ['.kt', '.kts'] as const;
export const JAVA = ['.java'] as const;
export const ANDROID_SOURCES = [...KOTLIN, ...JAVA] as const;

const MAX_SNIPPET = 200;

export interface RuleDefinition {
  name: string;
  category: string;
  issueType: string;
  suggestion: string;
  description: string;
  extensions?: readonly string[];
  /** Only files below one of these directory names are analyzed */
  pathSegments?: readonly string[];
}

/**
 * Shared plumbing for concrete rules. Subclasses implement `detect` as a
 * generator over one file's lines; configuration is fixed at construction.
 */
export abstract class BaseRule implements Rule {
  readonly name: string;
  readonly category: string;
  readonly issueType: string;
  readonly suggestion: string;
  readonly description: string;
  readonly extensions: readonly string[];
  readonly pathSegments?: readonly string[];

  protected constructor(definition: RuleDefinition) {
    this.name = definition.name;
    this.category = definition.category;
    this.issueType = definition.issueType;
    this.suggestion = definition.suggestion;
    this.description = definition.description;
    this.extensions = definition.extensions ?? ANDROID_SOURCES;
    this.pathSegments = definition.pathSegments;
  }

  appliesTo(filePath: string): boolean {
    if (!this.extensions.includes(extname(filePath).toLowerCase())) return false;
    if (!this.pathSegments) return true;
    const segments = filePath.toLowerCase().split(/[\\/]/);
    return this.pathSegments.some((segment) => segments.includes(segment.toLowerCase()));
  }

  analyze(filePath: string, lines: readonly string[]): Iterable<RuleMatch> {
    const applies = this.appliesTo(filePath);
    return {
      [Symbol.iterator]: () => (applies ? this.detect(lines, filePath) : [][Symbol.iterator]()),
    };
  }

  protected abstract detect(lines: readonly string[], filePath: string): Generator<RuleMatch>;

  protected match(lines: readonly string[], index: number, detail: string, severity: Severity): RuleMatch {
    return {
      line: index + 1,
      matchedCode: lines[index].trim().substring(0, MAX_SNIPPET),
      detail,
      severity,
    };
  }

  /**
   * Run a boundary lookup that may not resolve. An unresolved boundary means
   * the occurrence is skipped, not that the file fails.
   */
  protected resolve<T>(lookup: () => T): T | undefined {
    try {
      return lookup();
    } catch (err) {
      if (err instanceof RuleEvaluationError) return undefined;
      throw err;
    }
  }

  /** Indexes of non-comment lines matching `pattern`. */
  protected *matchingLines(lines: readonly string[], pattern: RegExp): Generator<number> {
    for (let i = 0; i < lines.length; i++) {
      if (isCommentLine(lines[i])) continue;
      if (pattern.test(codeOf(lines[i]))) yield i;
    }
  }
}
