/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { extname, join, resolve } from 'node:path';
import { ExportError, ReportError } from '../core/errors.js';
import { describeError, logConsole } from '../core/logging.js';
import { shorten, toPathSegment } from '../core/serial.js';
import {
  verdictLabel,
  type DataTable,
  type LogMetadata,
  type VerdictLabel,
  type Verdict,
} from '../core/types.js';
import { serializeTable } from '../tools/csv.js';
import { ensureDirectory, isRegularFile } from '../tools/files.js';
import { renderPdfReport, type DocumentRenderer, type ReportDocument } from './pdf-report.js';
import { DEFAULT_REPORT_TIME_ZONE, formatDisplayStamp, formatFileStamp } from './timestamps.js';

export const REPORT_TITLE = 'Pump Configuration Verification Report';
const NOT_AVAILABLE = 'N/A';

export interface ReportBuilderOptions {
  outputFolder: string;
  timeZone?: string;
  renderDocument?: DocumentRenderer;
  copyFile?: (source: string, destination: string) => Promise<void>;
}

/**
 * Where every artifact of one verification lands. All names share `prefix`.
 */
export interface ArtifactLayout {
  verdict: VerdictLabel;
  folder: string;
  prefix: string;
  reportPath: string;
  exportPath: string;
}

export interface ReportRequest {
  serialNumber: string;
  verdict: Verdict;
  metadata: LogMetadata;
  timestamp: Date;
}

export interface ArchiveSummary {
  copied: string[];
  failed: Array<{ source: string; reason: string }>;
}

export class ReportBuilder {
  readonly outputFolder: string;
  readonly timeZone: string;
  private readonly renderDocument: DocumentRenderer;
  private readonly copyFile: (source: string, destination: string) => Promise<void>;

  constructor(options: ReportBuilderOptions) {
    this.outputFolder = resolve(options.outputFolder);
    this.timeZone = options.timeZone ?? DEFAULT_REPORT_TIME_ZONE;
    this.renderDocument = options.renderDocument ?? renderPdfReport;
    this.copyFile = options.copyFile ?? ((source, destination) => fs.copyFile(source, destination));
  }

  layout(serialNumber: string, isPass: boolean, timestamp: Date): ArtifactLayout {
    const verdict = verdictLabel(isPass);
    const folder = join(this.outputFolder, `${toPathSegment(serialNumber)}_${verdict}`);
    const prefix = `${toPathSegment(shorten(serialNumber))}_${formatFileStamp(timestamp, this.timeZone)}`;
    return {
      verdict,
      folder,
      prefix,
      reportPath: join(folder, `${prefix}_${verdict}.pdf`),
      exportPath: join(folder, `${prefix}_parsed.csv`),
    };
  }

  archivePath(layout: ArtifactLayout, sourcePath: string): string {
    return join(layout.folder, `${layout.prefix}_log${extname(sourcePath)}`);
  }

  /**
   * Creates the result folder and renders the report document into it.
   *
   * @throws ReportError
   */
  async report(request: ReportRequest): Promise<ArtifactLayout> {
    const layout = this.layout(request.serialNumber, request.verdict.isPass, request.timestamp);
    try {
      await ensureDirectory(layout.folder);
    } catch (error) {
      throw new ReportError(`Failed to create result folder ${layout.folder}: ${describeError(error)}`, {
        cause: error,
      });
    }
    try {
      await this.renderDocument(layout.reportPath, this.buildDocument(request, layout.verdict));
    } catch (error) {
      throw new ReportError(`Failed to render ${layout.reportPath}: ${describeError(error)}`, {
        cause: error,
      });
    }
    return layout;
  }

  buildDocument(request: ReportRequest, verdict: VerdictLabel): ReportDocument {
    const { metadata, verdict: outcome } = request;
    const notes: Array<[string, string]> = [['Config Tag', outcome.configTag]];
    if (outcome.error) {
      notes.push(['Reason', outcome.error]);
    }
    return {
      title: REPORT_TITLE,
      verdict,
      heading: 'Software Information',
      rows: [
        ['Serial Number', request.serialNumber],
        ['Model', metadata.model ?? NOT_AVAILABLE],
        ['Software Version', metadata.softwareVersion ?? NOT_AVAILABLE],
        ['Firmware Version', metadata.firmwareVersion ?? NOT_AVAILABLE],
        ['Verification Date', formatDisplayStamp(request.timestamp, this.timeZone)],
      ],
      notes,
    };
  }

  /**
   * Writes the parsed configuration table next to the report.
   *
   * @throws ExportError
   */
  async exportTable(layout: ArtifactLayout, table: DataTable): Promise<string> {
    try {
      await ensureDirectory(layout.folder);
      await fs.writeFile(layout.exportPath, serializeTable(table, { byteOrderMark: true }), 'utf8');
      return layout.exportPath;
    } catch (error) {
      throw new ExportError(`Failed to write ${layout.exportPath}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Copies the original input, and the export when it lives elsewhere, into
   * the result folder. Copy failures are logged and reported, never thrown.
   */
  async archive(layout: ArtifactLayout, sourcePath: string, exportPath?: string): Promise<ArchiveSummary> {
    const summary: ArchiveSummary = { copied: [], failed: [] };
    await this.copyInto(sourcePath, this.archivePath(layout, sourcePath), summary);

    if (
      exportPath &&
      resolve(exportPath) !== resolve(sourcePath) &&
      resolve(exportPath) !== resolve(layout.exportPath)
    ) {
      await this.copyInto(exportPath, layout.exportPath, summary);
    }
    return summary;
  }

  private async copyInto(source: string, destination: string, summary: ArchiveSummary): Promise<void> {
    try {
      if (!(await isRegularFile(source))) {
        throw new Error('source is not a readable file');
      }
      await this.copyFile(source, destination);
      summary.copied.push(destination);
    } catch (error) {
      const reason = describeError(error);
      summary.failed.push({ source, reason });
      logConsole('warn', 'Failed to archive file', [
        ['source', source],
        ['destination', destination],
        ['error', reason],
      ]);
    }
  }
}
