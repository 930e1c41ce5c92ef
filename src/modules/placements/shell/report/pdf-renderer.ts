import { jsPDF } from 'jspdf';
import { err, ok, type Result } from 'neverthrow';

import { createRenderError, type ReportError } from '../../core/errors.js';

import type { Hasher, ReportRenderer } from '../../core/ports.js';
import type { ReportBar, ReportOutline } from '../../core/usecases/build-report-outline.js';

export const PDF_CONTENT_TYPE = 'application/pdf';

/** Every report carries this creation date; wall-clock time would change the bytes. */
export const REPORT_CREATION_DATE = new Date(Date.UTC(2000, 0, 1, 0, 0, 0));

// A4 portrait, millimetres
const PAGE_WIDTH = 210;
const PAGE_HEIGHT = 297;
const MARGIN = 15;
const CONTENT_WIDTH = PAGE_WIDTH - MARGIN * 2;
const BOTTOM_LIMIT = PAGE_HEIGHT - 20;

const LABEL_WIDTH = 55;
const VALUE_WIDTH = 35;
const BAR_AREA_WIDTH = CONTENT_WIDTH - LABEL_WIDTH - VALUE_WIDTH;
const BAR_HEIGHT = 4.5;
const BAR_GAP = 1.5;

const PRIMARY: [number, number, number] = [30, 64, 175];
const TEXT: [number, number, number] = [15, 23, 42];
const MUTED: [number, number, number] = [100, 116, 139];
const BAR_FILL: [number, number, number] = [96, 165, 250];
const BAND_FILL: [number, number, number] = [241, 245, 249];

export interface PdfReportRendererOptions {
  hasher: Hasher;
}

class PdfWriter {
  private y = MARGIN;

  constructor(private readonly doc: jsPDF) {}

  private ensureSpace(height: number): void {
    if (this.y + height > BOTTOM_LIMIT) {
      this.doc.addPage();
      this.y = MARGIN;
    }
  }

  private wrap(text: string, width: number): string[] {
    const lines: unknown = this.doc.splitTextToSize(text, width);
    return Array.isArray(lines) ? lines.map(String) : [text];
  }

  header(title: string): void {
    this.doc.setFillColor(...PRIMARY);
    this.doc.rect(0, 0, PAGE_WIDTH, 30, 'F');
    this.doc.setTextColor(255, 255, 255);
    this.doc.setFont('helvetica', 'bold');
    this.doc.setFontSize(20);
    this.doc.text(title, MARGIN, 19);
    this.y = 40;
  }

  heading(text: string): void {
    this.ensureSpace(12);
    this.doc.setTextColor(...PRIMARY);
    this.doc.setFont('helvetica', 'bold');
    this.doc.setFontSize(13);
    this.doc.text(text, MARGIN, this.y);
    this.y += 7;
  }

  paragraph(text: string, options: { muted?: boolean; size?: number } = {}): void {
    const size = options.size ?? 10;
    const lineHeight = size * 0.45;
    this.doc.setFont('helvetica', 'normal');
    this.doc.setFontSize(size);
    this.doc.setTextColor(...(options.muted === true ? MUTED : TEXT));
    for (const line of this.wrap(text, CONTENT_WIDTH)) {
      this.ensureSpace(lineHeight);
      this.doc.text(line, MARGIN, this.y);
      this.y += lineHeight;
    }
  }

  bullets(lines: readonly string[]): void {
    for (const line of lines) {
      this.paragraph(`- ${line}`);
    }
    this.y += 3;
  }

  bars(bars: readonly ReportBar[]): void {
    const max = Math.max(0, ...bars.map((b) => b.value));
    this.doc.setFontSize(8);
    for (const [i, bar] of bars.entries()) {
      this.ensureSpace(BAR_HEIGHT + BAR_GAP);
      if (i % 2 === 0) {
        this.doc.setFillColor(...BAND_FILL);
        this.doc.rect(MARGIN, this.y - 1, CONTENT_WIDTH, BAR_HEIGHT + 1, 'F');
      }

      this.doc.setFont('helvetica', 'normal');
      this.doc.setTextColor(...TEXT);
      const [label = ''] = this.wrap(bar.label, LABEL_WIDTH - 2);
      this.doc.text(label, MARGIN + 1, this.y + BAR_HEIGHT - 1.2);

      const width = max > 0 ? (Math.max(bar.value, 0) / max) * BAR_AREA_WIDTH : 0;
      if (width > 0) {
        this.doc.setFillColor(...BAR_FILL);
        this.doc.rect(MARGIN + LABEL_WIDTH, this.y, width, BAR_HEIGHT - 1, 'F');
      }

      this.doc.text(bar.display, PAGE_WIDTH - MARGIN - 1, this.y + BAR_HEIGHT - 1.2, {
        align: 'right',
      });
      this.y += BAR_HEIGHT + BAR_GAP;
    }
    this.y += 4;
  }

  gap(mm: number): void {
    this.y += mm;
  }

  footer(text: string): void {
    const pages = this.doc.getNumberOfPages();
    for (let page = 1; page <= pages; page++) {
      this.doc.setPage(page);
      this.doc.setFont('helvetica', 'normal');
      this.doc.setFontSize(8);
      this.doc.setTextColor(...MUTED);
      this.doc.text(`${text} - page ${String(page)} of ${String(pages)}`, PAGE_WIDTH / 2, 290, {
        align: 'center',
      });
    }
  }
}

const drawOutline = (doc: jsPDF, outline: ReportOutline): void => {
  const writer = new PdfWriter(doc);
  writer.header(outline.title);

  writer.heading('Filters');
  writer.bullets(outline.filterLines);

  writer.heading('Key Metrics');
  writer.bullets(outline.kpiLines);

  if (outline.emptyMessage !== null) {
    writer.paragraph(outline.emptyMessage, { muted: true });
  }

  for (const section of outline.sections) {
    writer.gap(2);
    writer.heading(section.title);
    if (section.insight !== '') {
      writer.paragraph(section.insight, { muted: true, size: 9 });
      writer.gap(2);
    }
    if (section.bars.length > 0) {
      writer.bars(section.bars);
    }
  }

  writer.footer(outline.title);
};

/**
 * jsPDF renderer. Output depends only on the outline: the creation date is
 * fixed and the document id is derived from the outline contents.
 */
export const createPdfReportRenderer = (options: PdfReportRendererOptions): ReportRenderer => ({
  contentType: PDF_CONTENT_TYPE,

  render(outline: ReportOutline): Result<Uint8Array, ReportError> {
    try {
      const doc = new jsPDF({ orientation: 'portrait', unit: 'mm', format: 'a4' });
      doc.setCreationDate(REPORT_CREATION_DATE);
      doc.setFileId(options.hasher.sha256(JSON.stringify(outline)).slice(0, 32).toUpperCase());
      doc.setProperties({ title: outline.title, subject: 'Campus placement analytics' });

      drawOutline(doc, outline);

      return ok(new Uint8Array(doc.output('arraybuffer')));
    } catch (error) {
      return err(createRenderError(error));
    }
  },
});
