import { jsPDF } from "jspdf";
import autoTable from "jspdf-autotable";
import { Report, ReportBlock } from "./reportBuilder";

/** PNG bytes keyed by chart name. */
export type ChartImages = ReadonlyMap<string, Uint8Array>;

const MARGIN = 50;
const LINE_HEIGHT = 14;
const HEADING_SIZES: Record<1 | 2 | 3, number> = { 1: 16, 2: 13, 3: 11 };

class PdfWriter {
  readonly doc: jsPDF;
  private y = MARGIN;

  constructor(report: Report) {
    this.doc = new jsPDF({ unit: "pt", format: "a4", putOnlyUsedFonts: true });
    this.doc.setProperties({ title: report.title, creator: "grade-analytics" });
    this.doc.setCreationDate(report.createdAt);
    this.doc.setFileId(report.fileId);
  }

  private get pageWidth(): number {
    return this.doc.internal.pageSize.getWidth();
  }

  private get pageHeight(): number {
    return this.doc.internal.pageSize.getHeight();
  }

  private get contentWidth(): number {
    return this.pageWidth - 2 * MARGIN;
  }

  private reserve(height: number): void {
    if (this.y + height > this.pageHeight - MARGIN) {
      this.newPage();
    }
  }

  newPage(): void {
    this.doc.addPage();
    this.y = MARGIN;
  }

  title(text: string): void {
    this.y = this.pageHeight / 3;
    this.doc.setFont("helvetica", "bold").setFontSize(24);
    this.doc.text(text, this.pageWidth / 2, this.y, { align: "center" });
    this.y += 40;
  }

  heading(level: 1 | 2 | 3, text: string): void {
    const size = HEADING_SIZES[level];
    this.reserve(size + 20);
    this.y += level === 1 ? 10 : 4;
    this.doc.setFont("helvetica", "bold").setFontSize(size);
    this.doc.text(text, MARGIN, this.y);
    this.y += size + 6;
  }

  paragraph(text: string, centered = false): void {
    this.doc.setFont("helvetica", "normal").setFontSize(11);
    const lines: string[] = this.doc.splitTextToSize(text, this.contentWidth);
    for (const line of lines) {
      this.reserve(LINE_HEIGHT);
      if (centered) this.doc.text(line, this.pageWidth / 2, this.y, { align: "center" });
      else this.doc.text(line, MARGIN, this.y);
      this.y += LINE_HEIGHT;
    }
    this.y += 6;
  }

  table(columns: string[], rows: string[][], columnWidths?: number[]): void {
    this.reserve(40);
    const columnStyles = Object.fromEntries(
      (columnWidths ?? []).map((width, index) => [index, { cellWidth: width }])
    );
    let finalY = this.y;
    autoTable(this.doc, {
      head: [columns],
      body: rows,
      startY: this.y,
      margin: { left: MARGIN, right: MARGIN },
      theme: "grid",
      styles: { fontSize: 8, cellPadding: 3 },
      headStyles: { fillColor: [128, 128, 128], textColor: 255, fontStyle: "bold" },
      alternateRowStyles: { fillColor: [240, 240, 240] },
      columnStyles,
      didDrawPage: (data) => {
        if (data.cursor) finalY = data.cursor.y;
      },
    });
    this.y = finalY + 14;
  }

  image(png: Uint8Array, width: number, height: number): void {
    const scale = Math.min(1, this.contentWidth / width);
    const w = width * scale;
    const h = height * scale;
    this.reserve(h + 10);
    this.doc.addImage(png, "PNG", MARGIN + (this.contentWidth - w) / 2, this.y, w, h);
    this.y += h + 14;
  }

  toBuffer(): Buffer {
    return Buffer.from(this.doc.output("arraybuffer"));
  }
}

const renderBlock = (writer: PdfWriter, block: ReportBlock, charts: ChartImages, onCover: boolean): void => {
  switch (block.kind) {
    case "title":
      writer.title(block.text);
      break;
    case "heading":
      writer.heading(block.level, block.text);
      break;
    case "paragraph":
      writer.paragraph(block.text, onCover);
      break;
    case "table":
      writer.table(block.columns, block.rows, block.columnWidths);
      break;
    case "chart": {
      const png = charts.get(block.chart);
      if (png) writer.image(png, block.width, block.height);
      else writer.paragraph(`Chart "${block.caption}" is not available.`);
      break;
    }
    case "pageBreak":
      writer.newPage();
      break;
  }
};

/**
 * Lays the report out on A4 pages. Charts missing from `charts` are replaced
 * by a short notice.
 */
export const renderReportPdf = (report: Report, charts: ChartImages): Buffer => {
  const writer = new PdfWriter(report);
  let onCover = true;
  for (const block of report.blocks) {
    renderBlock(writer, block, charts, onCover);
    if (block.kind === "pageBreak") onCover = false;
  }
  return writer.toBuffer();
};
