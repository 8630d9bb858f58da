/**
 * Scheduler Service
 *
 * Interval scheduling for `watch` mode using toad-scheduler. Stands in for
 * the external cron that otherwise triggers single-shot runs.
 *
 * @example
 * const scheduler = new SchedulerService(log)
 * scheduler.scheduleInterval('reconcile', 60, async () => {
 *   // one cycle
 * })
 */
import { AsyncTask, SimpleIntervalJob, ToadScheduler } from 'toad-scheduler'
import type { Logger } from 'pino'

/** Handler function type for scheduled jobs */
export type JobHandler = (jobName: string) => Promise<void>

export class SchedulerService {
  /** The scheduler instance */
  private readonly scheduler = new ToadScheduler()

  /** Names of registered jobs */
  private readonly jobs = new Set<string>()

  constructor(private readonly log: Logger) {}

  /**
   * Runs `handler` now and then every `seconds`. A tick that is still running
   * when the next one is due is not overlapped.
   */
  scheduleInterval(name: string, seconds: number, handler: JobHandler): void {
    if (this.jobs.has(name)) {
      throw new Error(`Job ${name} is already scheduled`)
    }

    const task = new AsyncTask(
      `${name}-task`,
      async () => {
        try {
          this.log.debug(`Running scheduled job: ${name}`)
          await handler(name)
          this.log.debug(`Job ${name} completed successfully`)
        } catch (error) {
          this.log.error({ error }, `Error in job ${name}`)
        }
      },
      (error) => {
        this.log.error({ error }, `Job task error for ${name}`)
      },
    )

    const job = new SimpleIntervalJob(
      { seconds, runImmediately: true },
      task,
      { id: name, preventOverrun: true },
    )

    this.scheduler.addSimpleIntervalJob(job)
    this.jobs.add(name)
    this.log.info(`Scheduled job ${name} every ${seconds}s`)
  }

  /**
   * Get a list of all registered job names
   */
  getActiveJobs(): string[] {
    return Array.from(this.jobs)
  }

  /**
   * Stop the scheduler and all running jobs
   */
  stop(): void {
    this.log.info('Stopping all scheduled jobs')
    this.scheduler.stop()
    this.jobs.clear()
  }
}
