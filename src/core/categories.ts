import { z } from "zod";
import defaultTables from "../../resources/categories.json";
import { UnclassifiableCategoryError } from "../common/errors";

const ruleSchema = z
  .object({
    labels: z.array(z.string()).optional(),
    pattern: z.string().optional(),
    // omitted: the vendor label itself becomes the type
    type: z.string().optional(),
    unit: z.string(),
  })
  .refine((r) => r.labels !== undefined || r.pattern !== undefined, {
    message: "rule needs labels or a pattern",
  });

const tablesSchema = z.record(z.string(), z.array(ruleSchema));

export interface Classification {
  type: string;
  unit: string;
}

interface CompiledRule {
  labels: Set<string>;
  pattern: RegExp | null;
  type: string | undefined;
  unit: string;
}

/**
 * Maps free-text vendor categories to (type, unit). Each source has an
 * ordered rule list; the first rule that matches wins, so overlapping rules
 * resolve by their position in the table.
 */
export class CategoryClassifier {
  private readonly tables = new Map<string, CompiledRule[]>();

  constructor(tables: unknown = defaultTables) {
    for (const [source, rules] of Object.entries(tablesSchema.parse(tables))) {
      this.tables.set(
        source,
        rules.map((r) => ({
          labels: new Set((r.labels ?? []).map((l) => l.toLowerCase())),
          pattern: r.pattern ? new RegExp(r.pattern, "i") : null,
          type: r.type,
          unit: r.unit,
        }))
      );
    }
  }

  classify(source: string, label: string): Classification | null {
    const rules = this.tables.get(source);
    if (!rules) return null;
    const wanted = label.trim();
    const lowered = wanted.toLowerCase();
    for (const rule of rules) {
      if (rule.labels.has(lowered) || rule.pattern?.test(wanted)) {
        return { type: rule.type ?? wanted, unit: rule.unit };
      }
    }
    return null;
  }

  classifyOrThrow(source: string, label: string): Classification {
    const found = this.classify(source, label);
    if (!found) {
      throw new UnclassifiableCategoryError(
        `No category rule for '${label}' in source ${source}`,
        { source, label }
      );
    }
    return found;
  }

  hasSource(source: string): boolean {
    return this.tables.has(source);
  }
}
