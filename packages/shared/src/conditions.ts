export type ConditionType = "ERROR" | "WARNING";

export interface PluginExceptionCondition {
  type: ConditionType;
  message: string;
}

/**
 * Conditions grouped by key. A `null` key holds general conditions that are
 * not tied to a single template property.
 */
export interface KeyedConditions {
  key: string | null;
  conditions: PluginExceptionCondition[];
}
