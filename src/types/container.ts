/**
 * Container identity and runtime type definitions
 */

export type ContainerResolvedVia = 'ENV_OVERRIDE' | 'CGROUP_LOOKUP' | 'HOSTNAME_FALLBACK';

export interface ContainerIdentity {
  name: string;
  id: string;
  resolvedVia: ContainerResolvedVia;
}

export interface ContainerFacts {
  name: string;
  id: string;
}

export interface ContainerStats {
  name: string;
  cpuPercent: number | null;
  memoryUsage: string;
  memoryPercent: number | null;
  netIO: string | null;
  blockIO: string | null;
  status: 'running';
}

export interface ContainerLogs {
  container: string;
  lines: number;
  logs: string;
}

export type ContainerAction = 'start' | 'stop' | 'restart';

export interface ContainerActionResult {
  container: string;
  action: ContainerAction;
  message: string;
}

/**
 * State of the monitored service's container as the runtime reports it
 */
export interface ServiceStats {
  name: string;
  status: string;
  /** ISO timestamp; null when the runtime reports the zero time */
  startedAt: string | null;
  /** Only while running */
  uptimeSeconds: number | null;
}
