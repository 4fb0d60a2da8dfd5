import { AnalyzedRow } from "../models/StudentRecord";
import { errorMessage } from "../utils/errors";
import logger from "../utils/logger";
import { renderPng } from "./chartRenderer";
import { Chart, buildChartSet } from "./charts";
import { ReportOptions, buildReport, chartsUsed } from "./reportBuilder";
import { ChartImages, renderReportPdf } from "./reportRenderer";

/**
 * Rasterises the charts one by one. A chart that fails to render is left out,
 * and the report prints a notice in its place.
 */
export const renderChartImages = async (charts: ReadonlyArray<Chart>): Promise<ChartImages> => {
  const images = new Map<string, Uint8Array>();
  for (const chart of charts) {
    try {
      images.set(chart.name, await renderPng(chart.svg));
    } catch (err) {
      logger.warn(`Chart ${chart.name} left out of the report: ${errorMessage(err)}`);
    }
  }
  return images;
};

/** Builds the report for `rows`, renders the charts it embeds and lays out the PDF. */
export const createReportPdf = async (
  rows: ReadonlyArray<AnalyzedRow>,
  options: ReportOptions
): Promise<Buffer> => {
  const report = buildReport(rows, options);
  const wanted = new Set(chartsUsed(report));
  const charts = buildChartSet(rows).filter((chart) => wanted.has(chart.name));
  const images = await renderChartImages(charts);
  logger.info(`Rendering report "${report.title}" with ${images.size}/${wanted.size} charts`);
  return renderReportPdf(report, images);
};
