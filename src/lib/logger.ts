export type LogSeverity = 'info' | 'warn' | 'error';

export type DrawerEventType =
  | 'CELL_TOGGLED'
  | 'SAMPLE_COMMITTED'
  | 'GRID_RESET'
  | 'EXPORT_TABLE_WRITTEN'
  | 'EXPORT_IMAGE_WRITTEN'
  | 'EXPORT_FAILED'
  | 'PRESET_CHANGED'
  | 'POLICY_CHANGED'
  | 'SESSION_ENDED'
  | 'RENDER_CRASHED';

export type LogPayload = Record<string, string | number | boolean | null>;

export interface DrawerEvent {
  timestamp: number;
  type: DrawerEventType;
  payload: LogPayload;
  severity: LogSeverity;
}

/** Events kept in memory; older ones are dropped first. */
export const MAX_LOG_EVENTS = 500;

const consoleLine = (event: DrawerEvent): string => `[drawer] ${event.severity} ${event.type}`;

/**
 * Session event log. Every drawing and export step is recorded with its payload
 * and echoed to the console, errors through `console.error`.
 */
export class DrawerEventLog {
  private events: DrawerEvent[] = [];

  constructor(private readonly capacity: number = MAX_LOG_EVENTS) {}

  log(type: DrawerEventType, payload: LogPayload = {}, severity: LogSeverity = 'info'): DrawerEvent {
    const event: DrawerEvent = { timestamp: Date.now(), type, payload, severity };
    this.events.push(event);
    if (this.events.length > this.capacity) this.events.shift();

    if (severity === 'error') console.error(consoleLine(event), payload);
    else console.log(consoleLine(event), payload);
    return event;
  }

  getEvents(type?: DrawerEventType): DrawerEvent[] {
    return type ? this.events.filter((event) => event.type === type) : [...this.events];
  }

  clear(): void {
    this.events = [];
  }
}

export const Logger = new DrawerEventLog();
