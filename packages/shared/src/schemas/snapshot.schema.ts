import { z } from 'zod';

export const memoryPressureSchema = z.enum(['normal', 'warning', 'critical']);

export const thermalStateSchema = z.enum(['nominal', 'fair', 'serious', 'critical']);

export const probeGroupSchema = z.enum(['cpu', 'memory', 'gpu', 'disk', 'thermal', 'network', 'processes']);

/** JSON array of probe groups as stored alongside a snapshot row. */
export const unavailableGroupsSchema = z.array(probeGroupSchema);
