import type { Rule } from "../types";

/**
 * 单次替换的统计结果
 */
export interface SubstitutionResult {
  text: string;
  /** 所有规则累计替换的次数 */
  replacements: number;
  /** pattern -> 替换次数，只包含命中的规则 */
  hits: Map<string, number>;
}

/**
 * 有序的字面量替换表
 *
 * 规则按插入顺序依次作用于上一条规则的输出，前面规则产生的文本可以被后面的规则再次匹配。
 * 同一个 pattern 重复出现时，保留第一次出现的位置，替换值以最后一次为准。
 */
export class SubstitutionTable {
  readonly rules: readonly Rule[];

  private constructor(rules: Rule[]) {
    this.rules = Object.freeze(rules);
  }

  static fromEntries(
    entries: Iterable<readonly [string, string]>
  ): SubstitutionTable {
    const merged = new Map<string, string>();
    for (const [pattern, replacement] of entries) {
      if (pattern.length === 0) {
        throw new RangeError("Substitution pattern must not be empty");
      }
      merged.set(pattern, replacement);
    }

    return new SubstitutionTable(
      Array.from(merged, ([pattern, replacement]) =>
        Object.freeze({ pattern, replacement })
      )
    );
  }

  static fromRules(rules: Iterable<Rule>): SubstitutionTable {
    return SubstitutionTable.fromEntries(
      Array.from(rules, (rule): [string, string] => [
        rule.pattern,
        rule.replacement,
      ])
    );
  }

  get size(): number {
    return this.rules.length;
  }

  apply(text: string): string {
    return this.applyWithStats(text).text;
  }

  applyWithStats(text: string): SubstitutionResult {
    const hits = new Map<string, number>();
    let replacements = 0;
    let current = text;

    for (const { pattern, replacement } of this.rules) {
      // split 按从左到右、不重叠的方式切分，join 原样插入替换值（不解析 $& 之类的模式）
      const segments = current.split(pattern);
      const count = segments.length - 1;
      if (count === 0) {
        continue;
      }
      current = segments.join(replacement);
      hits.set(pattern, count);
      replacements += count;
    }

    return { text: current, replacements, hits };
  }
}
