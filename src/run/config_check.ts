import type { AppConfig } from '@/core/config';
import type { DatasetSource } from '@/indicators/base';
import { createBottomRoster } from '@/indicators/bottom';
import { createTopRoster } from '@/indicators/top';
import type { Side } from '@/indicators/types';

export interface MissingIndicatorConfig {
  side: Side;
  name: string;
}

const NO_DATA: DatasetSource = {
  get: async () => null,
  fetchedAt: () => null,
};

/**
 * Roster indicators without a bounds/weight entry. Those would report
 * as misconfigured on every run.
 */
export function findMissingIndicatorConfig(config: AppConfig): MissingIndicatorConfig[] {
  const context = { cache: NO_DATA, config: config.indicators };
  const missing: MissingIndicatorConfig[] = [];

  for (const indicator of [...createBottomRoster(context), ...createTopRoster(context)]) {
    if (!config.indicators.names(indicator.side).includes(indicator.name)) {
      missing.push({ side: indicator.side, name: indicator.name });
    }
  }
  return missing;
}
