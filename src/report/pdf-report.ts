/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createWriteStream } from 'node:fs';
import { finished } from 'node:stream/promises';
import PDFDocument from 'pdfkit';
import type { VerdictLabel } from '../core/types.js';

export interface ReportDocument {
  title: string;
  verdict: VerdictLabel;
  heading: string;
  rows: Array<[string, string]>;
  notes: Array<[string, string]>;
}

export type DocumentRenderer = (filePath: string, document: ReportDocument) => Promise<void>;

const COLORS = {
  title: '#C62229',
  heading: '#333333',
  pass: '#00AA00',
  fail: '#CC0000',
  labelCell: '#F0F0F0',
  grid: '#808080',
  text: '#000000',
};

const LABEL_WIDTH = 144;
const VALUE_WIDTH = 288;
const CELL_PADDING = 8;

function drawKeyValueTable(pdf: PDFKit.PDFDocument, rows: Array<[string, string]>): void {
  const left = pdf.page.margins.left;
  let y = pdf.y;
  pdf.fontSize(10);
  for (const [label, value] of rows) {
    const height =
      Math.max(
        pdf.heightOfString(label, { width: LABEL_WIDTH - CELL_PADDING * 2 }),
        pdf.heightOfString(value, { width: VALUE_WIDTH - CELL_PADDING * 2 }),
      ) +
      CELL_PADDING * 2;
    pdf.lineWidth(1).strokeColor(COLORS.grid);
    pdf.rect(left, y, LABEL_WIDTH, height).fillAndStroke(COLORS.labelCell, COLORS.grid);
    pdf.rect(left + LABEL_WIDTH, y, VALUE_WIDTH, height).stroke();
    pdf
      .fillColor(COLORS.text)
      .font('Helvetica-Bold')
      .text(label, left + CELL_PADDING, y + CELL_PADDING, { width: LABEL_WIDTH - CELL_PADDING * 2 });
    pdf
      .font('Helvetica')
      .text(value, left + LABEL_WIDTH + CELL_PADDING, y + CELL_PADDING, {
        width: VALUE_WIDTH - CELL_PADDING * 2,
      });
    y += height;
  }
  pdf.x = left;
  pdf.y = y;
}

/**
 * Renders an A4 verification report: title, a large verdict, the key/value
 * table, then free-form notes.
 */
export const renderPdfReport: DocumentRenderer = async (filePath, document) => {
  const pdf = new PDFDocument({ size: 'A4', margin: 54, info: { Title: document.title } });
  const output = createWriteStream(filePath);
  pdf.pipe(output);

  const width = pdf.page.width - pdf.page.margins.left - pdf.page.margins.right;
  pdf
    .font('Helvetica-Bold')
    .fontSize(22)
    .fillColor(COLORS.title)
    .text(document.title, { align: 'center', width });
  pdf.moveDown(1.5);
  pdf
    .fontSize(48)
    .fillColor(document.verdict === 'PASS' ? COLORS.pass : COLORS.fail)
    .text(document.verdict, { align: 'center', width });
  pdf.moveDown(1);

  pdf.fontSize(16).fillColor(COLORS.heading).text(document.heading);
  pdf.moveDown(0.5);
  drawKeyValueTable(pdf, document.rows);

  if (document.notes.length > 0) {
    pdf.moveDown(1.5);
    pdf.font('Helvetica-Bold').fontSize(16).fillColor(COLORS.heading).text('Verification');
    pdf.moveDown(0.5);
    drawKeyValueTable(pdf, document.notes);
  }

  pdf.end();
  await finished(output);
};
