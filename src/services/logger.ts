/**
 * Logger Service
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - Module-based debug filtering (persisted to localStorage when available)
 * - In-memory ring buffer of recent entries
 *
 * Usage:
 *   import { Logger } from './logger';
 *   const log = Logger.create('PipelineExecutor');
 *   log.debug('Bound 3 passes');
 *   log.info('Executor ready');
 *   log.warn('Shader warning');
 *   log.error('Bind failed', error);
 *
 * Runtime control:
 *   Logger.setLevel('DEBUG')               // Minimum level (debug output needs DEBUG)
 *   Logger.enable('*')                     // Debug logs for all modules
 *   Logger.enable('Executor,PassCompiler') // Debug logs for some modules
 *   Logger.disable()                       // Debug logs off
 *   Logger.getBuffer('WARN')               // Recent warnings and errors
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: unknown;
  stack?: string;
}

interface LoggerConfig {
  enabled: string[];      // Modules to show debug logs for ('*' = all)
  level: LogLevel;        // Minimum level to display
  timestamps: boolean;    // Prefix console output with time
  bufferSize: number;     // Max entries in memory buffer
}

// ============================================================================
// Constants
// ============================================================================

const STORAGE_KEY = 'upscale_logger_config';
const LOG_LEVELS: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

// ============================================================================
// State
// ============================================================================

const logBuffer: LogEntry[] = [];
const registeredModules = new Set<string>();

const DEFAULT_CONFIG: LoggerConfig = {
  enabled: [],
  level: 'INFO',
  timestamps: true,
  bufferSize: 500,
};

let config: LoggerConfig = { ...DEFAULT_CONFIG };

function getStorage(): Storage | null {
  return typeof localStorage === 'undefined' ? null : localStorage;
}

function loadConfig(): void {
  const storage = getStorage();
  if (!storage) return;
  try {
    const stored = storage.getItem(STORAGE_KEY);
    if (stored) {
      const parsed: Partial<LoggerConfig> = JSON.parse(stored);
      config = { ...config, ...parsed };
    }
  } catch (e) {
    console.warn('[Logger] Ignoring unreadable stored config', e);
  }
}

function saveConfig(): void {
  const storage = getStorage();
  if (!storage) return;
  try {
    storage.setItem(STORAGE_KEY, JSON.stringify(config));
  } catch (e) {
    console.warn('[Logger] Could not persist config', e);
  }
}

loadConfig();

// ============================================================================
// Core Logger Class
// ============================================================================

export class ModuleLogger {
  constructor(private readonly module: string) {
    registeredModules.add(module);
  }

  debug(message: string, data?: unknown): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('WARN', message, data);
  }

  error(message: string, error?: unknown): void {
    this.log('ERROR', message, error);
  }

  /** Log with timing - returns a function to call when done */
  time(label: string): () => void {
    const start = performance.now();
    this.debug(`${label} started`);
    return () => {
      const duration = (performance.now() - start).toFixed(2);
      this.debug(`${label} completed in ${duration}ms`);
    };
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    const entry = this.createEntry(level, message, data);
    this.addToBuffer(entry);

    if (!this.shouldLog(level)) return;

    const args: unknown[] = [this.formatPrefix(entry), message];
    if (data !== undefined) {
      args.push(data);
    }

    switch (level) {
      case 'DEBUG':
        console.debug(...args);
        break;
      case 'INFO':
        console.info(...args);
        break;
      case 'WARN':
        console.warn(...args);
        break;
      case 'ERROR':
        console.error(...args);
        break;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    // Errors always reach the console
    if (level === 'ERROR') return true;

    if (LOG_LEVELS[level] < LOG_LEVELS[config.level]) return false;

    if (level === 'DEBUG') {
      if (config.enabled.length === 0) return false;
      if (config.enabled.includes('*')) return true;
      return config.enabled.some(pattern =>
        this.module.toLowerCase().includes(pattern.toLowerCase())
      );
    }

    return true;
  }

  private createEntry(level: LogLevel, message: string, data?: unknown): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module: this.module,
      message,
    };

    if (data !== undefined) {
      if (data instanceof Error) {
        entry.data = { name: data.name, message: data.message };
        entry.stack = data.stack;
      } else {
        entry.data = data;
      }
    }

    return entry;
  }

  private formatPrefix(entry: LogEntry): string {
    const parts: string[] = [];
    if (config.timestamps) {
      parts.push(entry.timestamp.split('T')[1].split('.')[0]);
    }
    parts.push(`[${this.module}]`);
    parts.push(entry.level);
    return parts.join(' ');
  }

  private addToBuffer(entry: LogEntry): void {
    logBuffer.push(entry);
    while (logBuffer.length > config.bufferSize) {
      logBuffer.shift();
    }
  }
}

// ============================================================================
// Static Logger API
// ============================================================================

export const Logger = {
  /**
   * Create a logger for a specific module
   */
  create(module: string): ModuleLogger {
    return new ModuleLogger(module);
  },

  /**
   * Enable debug logging for modules
   * @param modules - Comma-separated module names or '*' for all
   */
  enable(modules: string = '*'): void {
    config.enabled = modules === '*' ? ['*'] : modules.split(',').map(m => m.trim());
    saveConfig();
  },

  disable(): void {
    config.enabled = [];
    saveConfig();
  },

  setLevel(level: LogLevel): void {
    config.level = level;
    saveConfig();
  },

  setTimestamps(enabled: boolean): void {
    config.timestamps = enabled;
    saveConfig();
  },

  /**
   * Recent entries, optionally only those at or above a level
   */
  getBuffer(levelFilter?: LogLevel): LogEntry[] {
    if (!levelFilter) return [...logBuffer];
    const minLevel = LOG_LEVELS[levelFilter];
    return logBuffer.filter(e => LOG_LEVELS[e.level] >= minLevel);
  },

  search(keyword: string): LogEntry[] {
    const lower = keyword.toLowerCase();
    return logBuffer.filter(e =>
      e.message.toLowerCase().includes(lower) ||
      e.module.toLowerCase().includes(lower)
    );
  },

  errors(): LogEntry[] {
    return logBuffer.filter(e => e.level === 'ERROR');
  },

  modules(): string[] {
    return [...registeredModules].sort();
  },

  clear(): void {
    logBuffer.length = 0;
  },

  /** Restore defaults (used by tests) */
  reset(): void {
    config = { ...DEFAULT_CONFIG };
    logBuffer.length = 0;
  },
};

export const createLogger = Logger.create;
