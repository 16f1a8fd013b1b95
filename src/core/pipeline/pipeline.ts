/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  PipelineObserver,
  PipelineStage,
  ProcessOutcome,
} from '../../types/observer.js';
import type { ArtifactLayout, ReportBuilder } from '../../report/report-builder.js';
import type { ResultSink, SyncEntry, SyncResult } from '../../sync/result-sink.js';
import { describeError, logConsole } from '../logging.js';
import { parseLogFile, type LogParser } from '../parsing/log-parser.js';
import { toVerdict, verdictLabel, type ParsedLog } from '../types.js';
import type { SerialVerifier } from '../verification/master-verifier.js';

export interface VerificationPipelineDeps {
  verifier: SerialVerifier;
  reporter: ReportBuilder;
  parseLog?: LogParser;
  sink?: ResultSink;
  observer?: PipelineObserver;
  now?: () => Date;
}

/**
 * Runs one log file through parse → serial check → verify → report →
 * export → archive → optional sync.
 *
 * Only parse, missing serial, report and export failures fail a run. A FAIL
 * verdict is a successful run, and archive or sync problems are logged and
 * otherwise ignored. `process` never rejects.
 */
export class VerificationPipeline {
  private readonly parseLog: LogParser;
  private readonly now: () => Date;

  constructor(private readonly deps: VerificationPipelineDeps) {
    this.parseLog = deps.parseLog ?? ((filePath) => parseLogFile(filePath));
    this.now = deps.now ?? (() => new Date());
  }

  async process(logFilePath: string): Promise<ProcessOutcome> {
    let outcome: ProcessOutcome;
    try {
      outcome = await this.run(logFilePath);
    } catch (error) {
      outcome = this.failure(logFilePath, 'failed', `Error processing file: ${describeError(error)}`);
    }
    this.deps.observer?.onOutcome?.(outcome);
    return outcome;
  }

  private async run(sourcePath: string): Promise<ProcessOutcome> {
    this.enter('parsing', sourcePath, 'reading log file');
    let parsed: ParsedLog;
    try {
      parsed = await this.parseLog(sourcePath);
    } catch (error) {
      return this.failure(sourcePath, 'parsing', `Failed to parse log file: ${describeError(error)}`);
    }

    this.enter('serial-check', sourcePath, `detected ${parsed.format} layout`);
    const serialNumber = parsed.serialNumber;
    if (!serialNumber) {
      return this.failure(sourcePath, 'serial-check', 'Serial number not found in log file');
    }

    this.enter('verifying', sourcePath, `checking ${serialNumber} against master list`);
    const verdict = toVerdict(await this.deps.verifier.verify(serialNumber, null));
    const label = verdictLabel(verdict.isPass);
    const verifiedAt = this.now();

    this.enter('reporting', sourcePath, `rendering ${label} report`);
    let layout: ArtifactLayout;
    try {
      layout = await this.deps.reporter.report({
        serialNumber,
        verdict,
        metadata: parsed.metadata,
        timestamp: verifiedAt,
      });
    } catch (error) {
      return this.failure(sourcePath, 'reporting', `Failed to generate report: ${describeError(error)}`, {
        serialNumber,
        verdict,
      });
    }

    this.enter('exporting', sourcePath, 'writing parsed table');
    let exportPath: string;
    try {
      exportPath = await this.deps.reporter.exportTable(layout, parsed.configTable);
    } catch (error) {
      return this.failure(sourcePath, 'exporting', `Failed to export parsed CSV: ${describeError(error)}`, {
        serialNumber,
        verdict,
        resultFolder: layout.folder,
      });
    }

    this.enter('archiving', sourcePath, 'copying source log');
    const archive = await this.deps.reporter.archive(layout, sourcePath, exportPath);

    let synced: boolean | undefined;
    if (this.deps.sink) {
      this.enter('syncing', sourcePath, 'recording result');
      const result = await this.sync(this.deps.sink, {
        serialNumber,
        configTag: verdict.configTag,
        result: label,
        resultFolderPath: layout.folder,
        verificationDate: verifiedAt,
      });
      synced = result.ok;
    }

    const message = `Processing completed: ${serialNumber} - ${label}`;
    this.enter('done', sourcePath, message);
    logConsole('info', 'Verification complete', [
      ['file', sourcePath],
      ['serial', serialNumber],
      ['result', label],
      ['config tag', verdict.configTag],
      ['reason', verdict.error],
      ['folder', layout.folder],
      ['archive failures', archive.failed.length || undefined],
    ]);
    return {
      success: true,
      message,
      sourcePath,
      stage: 'done',
      serialNumber,
      verdict,
      resultFolder: layout.folder,
      reportPath: layout.reportPath,
      verifiedAt,
      synced,
    };
  }

  /**
   * Sync never changes the outcome of a run. A failed or throwing sink is
   * logged and its result discarded by the caller.
   */
  private async sync(sink: ResultSink, entry: SyncEntry): Promise<SyncResult> {
    let result: SyncResult;
    try {
      result = await sink.record(entry);
    } catch (error) {
      result = { ok: false, error: describeError(error) };
    }
    if (!result.ok) {
      logConsole('warn', 'Result sync failed', [
        ['serial', entry.serialNumber],
        ['error', result.error],
      ]);
    }
    return result;
  }

  private enter(stage: PipelineStage, sourcePath: string, message: string): void {
    this.deps.observer?.onStage?.({ stage, sourcePath, message });
  }

  private failure(
    sourcePath: string,
    stage: PipelineStage,
    message: string,
    extra: Partial<ProcessOutcome> = {},
  ): ProcessOutcome {
    logConsole('error', 'Verification failed', [
      ['file', sourcePath],
      ['stage', stage],
      ['reason', message],
    ]);
    this.deps.observer?.onStage?.({ stage: 'failed', sourcePath, message, data: { from: stage } });
    return { ...extra, success: false, message, sourcePath, stage };
  }
}
