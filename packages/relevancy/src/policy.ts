import type { RelevancySettings, UpdateFrequency } from "@mirrorsync/core";

/**
Явные fail-open умолчания движка.
missingSettings: что считать настройками объекта без записи.
unknownClientSeesAll: клиент, которого нет в кэше, видит всё. */
export interface RelevancyPolicy {
  missingSettings: RelevancySettings;
  unknownClientSeesAll: boolean;
  defaultMaxDistance: number;
}

export const DEFAULT_MAX_DISTANCE = 10000;

export const DEFAULT_RELEVANCY_POLICY: RelevancyPolicy = {
  missingSettings: { level: "AlwaysRelevant", frequency: "High", priority: "Normal" },
  unknownClientSeesAll: true,
  defaultMaxDistance: DEFAULT_MAX_DISTANCE,
};

export function makePolicy(over: Partial<RelevancyPolicy> = {}): RelevancyPolicy {
  return {
    ...DEFAULT_RELEVANCY_POLICY,
    ...over,
    missingSettings: { ...DEFAULT_RELEVANCY_POLICY.missingSettings, ...over.missingSettings },
  };
}

// OnDemand никогда не due сам по себе
export function isTierDue(freq: UpdateFrequency, tick: number): boolean {
  switch (freq) {
    case "High":
      return true;
    case "Medium":
      return tick % 2 === 0;
    case "Low":
      return tick % 4 === 0;
    case "OnDemand":
      return false;
  }
}
