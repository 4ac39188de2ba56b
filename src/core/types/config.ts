/**
 * Application configuration types
 */

export interface AppConfig {
  readonly storage: StorageConfig;
  readonly logging: LoggingConfig;
  readonly sounds: SoundsConfig;
  readonly audio: AudioConfig;
  readonly schedule: ScheduleConfig;
  readonly playout: PlayoutConfig;
}

export interface StorageConfig {
  /** Data directory holding rules.json and the default logs directory */
  readonly path: string;
  /** Keep the rule table in rules.json across restarts */
  readonly persist: boolean;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly directory?: string;
}

export interface SoundsConfig {
  /** Directory every sound name is resolved against */
  readonly basePath: string;
  /** Appended to sound names given without it */
  readonly extension: string;
  /** Strike sounds are `<strikePrefix>1` … `<strikePrefix>12` */
  readonly strikePrefix: string;
}

export interface AudioConfig {
  /** External player invoked as `command ...args <file>`; platform default when absent */
  readonly command?: string;
  readonly args?: readonly string[];
}

/** Hour span used by the default rule set */
export interface ScheduleConfig {
  readonly startHour: number;
  readonly endHour: number;
}

export interface PlayoutConfig {
  readonly pollIntervalMs: number;
  readonly wakeLeadMs: number;
  /** 0 disables the playback timeout */
  readonly timeoutMs: number;
}
