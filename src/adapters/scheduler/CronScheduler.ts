import cron from 'node-cron';
import { errorMessage } from '../../core/errors';
import { Logger } from '../../core/services/Logger';
import { ScheduledJob, ScheduleInfo, Scheduler } from '../../core/services/Scheduler';
import { formatTimeOfDay, nextOccurrence, nextOccurrenceInZone, parseTimeOfDay, TimeOfDay } from '../../core/time';

// Daily trigger; a run that is still going when the next one fires is skipped.
export class CronScheduler implements Scheduler {
  private cronJob: cron.ScheduledTask | null = null;
  private job: ScheduledJob | null = null;
  private time: TimeOfDay | null = null;
  private isProcessing = false;

  constructor(
    private logger: Logger,
    private timezone?: string
  ) {}

  start(time: string, job: ScheduledJob): void {
    this.job = job;
    this.schedule(parseTimeOfDay(time));
  }

  reschedule(time: string): void {
    if (!this.job) throw new Error('Scheduler has not been started');
    const next = parseTimeOfDay(time);
    if (this.time && formatTimeOfDay(this.time) === formatTimeOfDay(next)) return;
    this.schedule(next);
  }

  stop(): void {
    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
      this.logger.info('Scheduler stopped');
    }
  }

  async runJob(): Promise<void> {
    if (!this.job) return;
    if (this.isProcessing) {
      this.logger.warn('Previous daily send still in progress, skipping this trigger');
      return;
    }

    this.isProcessing = true;
    this.logger.info('Scheduled daily send starting');
    try {
      await this.job();
    } catch (error) {
      this.logger.error(`Scheduled daily send failed: ${errorMessage(error)}`);
    } finally {
      this.isProcessing = false;
    }
  }

  nextRun(now: Date = new Date()): Date | null {
    if (!this.cronJob || !this.time) return null;
    return this.timezone ? nextOccurrenceInZone(this.time, now, this.timezone) : nextOccurrence(this.time, now);
  }

  info(now: Date = new Date()): ScheduleInfo {
    return {
      running: this.cronJob !== null,
      time: this.time ? formatTimeOfDay(this.time) : null,
      timezone: this.timezone ?? null,
      nextRun: this.nextRun(now),
    };
  }

  private schedule(time: TimeOfDay): void {
    const expression = `${time.minute} ${time.hour} * * *`;
    if (!cron.validate(expression)) throw new RangeError(`Invalid cron expression '${expression}'`);

    this.cronJob?.stop();
    this.cronJob = cron.schedule(
      expression,
      () => {
        void this.runJob();
      },
      this.timezone ? { timezone: this.timezone } : {}
    );
    this.time = time;
    this.logger.info(
      `Daily send scheduled at ${formatTimeOfDay(time)}${this.timezone ? ` (${this.timezone})` : ''}`
    );
  }
}
