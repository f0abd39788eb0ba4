import type {
  ConditionType,
  KeyedConditions,
  PluginExceptionCondition,
} from "@stratus/shared";

/**
 * Collects errors and warnings over a batch without interrupting it.
 * Conditions are grouped by key; `null` holds general conditions.
 */
export class ConditionAccumulator {
  private readonly byKey = new Map<string | null, PluginExceptionCondition[]>();

  addError(key: string | null, message: string): void {
    this.add(key, "ERROR", message);
  }

  addWarning(key: string | null, message: string): void {
    this.add(key, "WARNING", message);
  }

  hasError(): boolean {
    for (const conditions of this.byKey.values()) {
      if (conditions.some((c) => c.type === "ERROR")) return true;
    }
    return false;
  }

  isEmpty(): boolean {
    return this.byKey.size === 0;
  }

  /** Every condition in insertion order, flattened with its key. */
  entries(): Array<{ key: string | null } & PluginExceptionCondition> {
    const result: Array<{ key: string | null } & PluginExceptionCondition> = [];
    for (const [key, conditions] of this.byKey) {
      for (const condition of conditions) {
        result.push({ key, ...condition });
      }
    }
    return result;
  }

  conditionsByKey(): KeyedConditions[] {
    return [...this.byKey].map(([key, conditions]) => ({
      key,
      conditions: [...conditions],
    }));
  }

  private add(key: string | null, type: ConditionType, message: string): void {
    const existing = this.byKey.get(key);
    if (existing) {
      existing.push({ type, message });
    } else {
      this.byKey.set(key, [{ type, message }]);
    }
  }
}
