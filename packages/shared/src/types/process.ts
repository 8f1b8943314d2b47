export type ProcessCategory =
  | 'browser'
  | 'developer'
  | 'productivity'
  | 'media'
  | 'communication'
  | 'system'
  | 'background'
  | 'other';

/**
 * Per-process resource usage as reported by the probe set.
 * Disk and network counters are cumulative bytes.
 */
export interface ProcessResourceSample {
  pid: number;
  name: string;
  bundleId?: string;
  category: ProcessCategory;
  cpuUsage: number;
  memoryUsage: number;
  diskReadBytes: number;
  diskWriteBytes: number;
  networkBytesIn: number;
  networkBytesOut: number;
}
