import fs from 'node:fs';
import crypto from 'node:crypto';
import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { CronExpressionParser } from 'cron-parser';
import { z } from 'zod';
import { cutModeSchema } from '../config.js';
import { InvalidOperationError, ProgramNotFoundError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { RecordingManager } from '../recorder/RecordingManager.js';

export const programInputSchema = z.object({
  name: z.string().trim().min(1),
  cron: z.string().trim().min(1),
  streams: z.array(z.string().trim().min(1)).min(1),
  /** 秒 */
  duration: z.number().int().positive(),
  startMode: cutModeSchema.optional(),
  stopMode: cutModeSchema.optional(),
  enabled: z.boolean().default(true),
});

const programSchema = programInputSchema.extend({ id: z.string().min(1) });

const scheduleFileSchema = z.object({
  programs: z.array(programSchema).default([]),
});

export type ScheduledProgram = z.infer<typeof programSchema>;
export type ProgramInput = z.input<typeof programInputSchema>;

type ScheduleFile = z.infer<typeof scheduleFileSchema>;

/**
 * cron 式で録音を予約する
 *
 * 番組は schedule.json に保存し、起動時に読み込んでジョブを登録する。
 */
export class ScheduleManager {
  private programs: ScheduledProgram[] = [];
  private cronJobs = new Map<string, ScheduledTask>();

  constructor(
    private readonly schedulePath: string,
    private readonly recordingManager: RecordingManager,
    private readonly logger: Logger,
    private readonly timezone: string = 'UTC',
  ) {}

  /** schedule.json を読み込み、有効なジョブを登録 */
  load(): number {
    this.programs = [];
    if (fs.existsSync(this.schedulePath)) {
      try {
        const raw = fs.readFileSync(this.schedulePath, 'utf-8');
        this.programs = scheduleFileSchema.parse(JSON.parse(raw)).programs;
      } catch (err) {
        this.logger.error(`Failed to parse ${this.schedulePath}: ${errorMessage(err)}`);
      }
    }

    this.registerAllJobs();
    this.logger.info(`Loaded ${this.programs.length} programs (${this.cronJobs.size} active)`);
    return this.programs.length;
  }

  getPrograms(): ScheduledProgram[] {
    return this.programs;
  }

  getProgramsWithNextRun(): (ScheduledProgram & { nextRun: string | null })[] {
    return this.programs.map((p) => ({ ...p, nextRun: p.enabled ? this.nextRun(p.cron) : null }));
  }

  addProgram(input: ProgramInput): ScheduledProgram {
    const parsed = programInputSchema.parse(input);
    this.assertValidCron(parsed.cron);

    const program: ScheduledProgram = { id: crypto.randomUUID(), ...parsed };
    this.programs.push(program);
    this.save();
    this.registerJob(program);
    this.logger.info(`Added program "${program.name}" (${program.cron})`);
    return program;
  }

  updateProgram(id: string, input: Partial<ProgramInput>): ScheduledProgram {
    const index = this.programs.findIndex((p) => p.id === id);
    if (index === -1) throw new ProgramNotFoundError(id);

    const program = programSchema.parse({ ...this.programs[index], ...input, id });
    this.assertValidCron(program.cron);

    this.programs[index] = program;
    this.save();
    this.unregisterJob(id);
    this.registerJob(program);
    return program;
  }

  deleteProgram(id: string): void {
    const index = this.programs.findIndex((p) => p.id === id);
    if (index === -1) throw new ProgramNotFoundError(id);

    const [program] = this.programs.splice(index, 1);
    this.save();
    this.unregisterJob(id);
    this.logger.info(`Deleted program "${program.name}" (${program.cron})`);
  }

  stopAll(): void {
    for (const [, task] of this.cronJobs) {
      task.stop();
    }
    this.cronJobs.clear();
  }

  /** 番組の全ストリームの録音を開始する (cron から呼ばれる) */
  trigger(program: ScheduledProgram): void {
    this.logger.info(`Triggering program: ${program.name}`);
    for (const streamId of program.streams) {
      try {
        this.recordingManager.start(streamId, {
          duration: program.duration,
          startMode: program.startMode,
          stopMode: program.stopMode,
        });
      } catch (err) {
        this.logger.error(`Starting '${streamId}' for "${program.name}" failed: ${errorMessage(err)}`);
      }
    }
  }

  private nextRun(expression: string): string | null {
    try {
      return CronExpressionParser.parse(expression, { tz: this.timezone }).next().toISOString();
    } catch {
      return null;
    }
  }

  private assertValidCron(expression: string): void {
    if (!cron.validate(expression)) {
      throw new InvalidOperationError(`Invalid cron expression: ${expression}`);
    }
  }

  private save(): void {
    const data: ScheduleFile = { programs: this.programs };
    fs.writeFileSync(this.schedulePath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
  }

  private registerAllJobs(): void {
    this.stopAll();
    for (const program of this.programs) {
      this.registerJob(program);
    }
  }

  private registerJob(program: ScheduledProgram): void {
    if (!program.enabled) return;
    if (!cron.validate(program.cron)) {
      this.logger.error(`Invalid cron expression for "${program.name}": ${program.cron}`);
      return;
    }

    const task = cron.schedule(program.cron, () => this.trigger(program), { timezone: this.timezone });
    this.cronJobs.set(program.id, task);
  }

  private unregisterJob(id: string): void {
    const task = this.cronJobs.get(id);
    if (task) {
      task.stop();
      this.cronJobs.delete(id);
    }
  }
}
