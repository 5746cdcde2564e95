export type ScheduledJob = () => Promise<void>;

export interface ScheduleInfo {
  running: boolean;
  time: string | null;
  timezone: string | null;
  nextRun: Date | null;
}

export interface Scheduler {
  start(time: string, job: ScheduledJob): void;
  reschedule(time: string): void;
  stop(): void;
  nextRun(now?: Date): Date | null;
  info(now?: Date): ScheduleInfo;
}
