import type BetterSqlite3 from 'better-sqlite3';

export function up(db: BetterSqlite3.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS snapshots (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp REAL NOT NULL,

      cpu_usage REAL NOT NULL DEFAULT 0,
      cpu_performance_cores REAL NOT NULL DEFAULT 0,
      cpu_efficiency_cores REAL NOT NULL DEFAULT 0,
      cpu_core_count INTEGER NOT NULL DEFAULT 0,

      memory_used INTEGER NOT NULL DEFAULT 0,
      memory_total INTEGER NOT NULL DEFAULT 0,
      memory_pressure TEXT NOT NULL DEFAULT 'normal',
      swap_used INTEGER NOT NULL DEFAULT 0,
      memory_wired INTEGER NOT NULL DEFAULT 0,
      memory_compressed INTEGER NOT NULL DEFAULT 0,

      gpu_usage REAL NOT NULL DEFAULT 0,
      gpu_memory_used INTEGER NOT NULL DEFAULT 0,
      gpu_temperature REAL NOT NULL DEFAULT 0,

      disk_read_rate REAL NOT NULL DEFAULT 0,
      disk_write_rate REAL NOT NULL DEFAULT 0,
      disk_read_ops REAL NOT NULL DEFAULT 0,
      disk_write_ops REAL NOT NULL DEFAULT 0,

      cpu_temperature REAL NOT NULL DEFAULT 0,
      fan_speed REAL NOT NULL DEFAULT 0,
      thermal_state TEXT NOT NULL DEFAULT 'nominal',

      network_bytes_in REAL NOT NULL DEFAULT 0,
      network_bytes_out REAL NOT NULL DEFAULT 0,

      unavailable TEXT NOT NULL DEFAULT '[]',
      active_process_count INTEGER NOT NULL DEFAULT 0,
      top_processes TEXT NOT NULL DEFAULT '[]'
    );

    CREATE INDEX IF NOT EXISTS idx_snapshots_timestamp
      ON snapshots(timestamp);
  `);
}
