/**
 * Rotation Metrics
 *
 * Prometheus counters for rotation activity, registered on prom-client's default
 * registry and served by the /metrics route.
 */

import { Counter, Gauge } from 'prom-client';

export const rotationMetrics = {
  passes: new Counter({
    name: 'log_rotation_passes_total',
    help: 'Rotation passes run, by outcome',
    labelNames: ['status'] as const,
  }),
  rollovers: new Counter({
    name: 'log_rotation_rollovers_total',
    help: 'Log files copied aside and truncated',
  }),
  archives: new Counter({
    name: 'log_rotation_archives_total',
    help: 'Rollover copies compressed into zip backups',
  }),
  filesPruned: new Counter({
    name: 'log_rotation_files_pruned_total',
    help: 'Rotated files deleted by retention, by stage',
    labelNames: ['stage'] as const,
  }),
  errors: new Counter({
    name: 'log_rotation_errors_total',
    help: 'Failures reported during rotation passes',
  }),
  schedulersActive: new Gauge({
    name: 'log_rotation_schedulers_active',
    help: 'Directories with a running rotation scheduler',
  }),
};
