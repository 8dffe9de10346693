export const OTEL_ATTR = {
  RUN_ID: 'sync.run.id',
  RUN_DRY_RUN: 'sync.run.dry_run',

  PLATFORM: 'sync.platform',
  PLATFORM_ROLE: 'sync.platform.role',
  PAGE_SIZE: 'sync.fetch.per_page',

  INDEX_SIZE: 'sync.index.size',
  DECISIONS: 'sync.plan.decisions',
  UPDATES_PLANNED: 'sync.plan.updates',
} as const;

export type OtelAttrKey = (typeof OTEL_ATTR)[keyof typeof OTEL_ATTR];
