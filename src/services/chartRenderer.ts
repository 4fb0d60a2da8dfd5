import fs from "fs";
import path from "path";
import sharp from "sharp";
import { Chart } from "./charts";
import logger from "../utils/logger";

export interface RenderedChart {
  name: string;
  title: string;
  png: Buffer;
}

/** Rasterises an SVG document to PNG at the given density (dpi). */
export const renderPng = async (svg: string, density = 150): Promise<Buffer> => {
  try {
    return await sharp(Buffer.from(svg), { density }).png().toBuffer();
  } catch (error) {
    logger.error("Failed to rasterise chart", error);
    throw new Error(`Failed to render chart: ${error instanceof Error ? error.message : "Unknown error"}`);
  }
};

export const renderCharts = async (charts: ReadonlyArray<Chart>): Promise<RenderedChart[]> => {
  const rendered: RenderedChart[] = [];
  for (const chart of charts) {
    rendered.push({ name: chart.name, title: chart.title, png: await renderPng(chart.svg) });
  }
  return rendered;
};

/** Writes `<name>.png` (and the source `<name>.svg`) for every chart; returns the PNG paths. */
export const writeCharts = async (directory: string, charts: ReadonlyArray<Chart>): Promise<string[]> => {
  await fs.promises.mkdir(directory, { recursive: true });
  const written: string[] = [];
  for (const chart of await renderCharts(charts)) {
    const pngPath = path.join(directory, `${chart.name}.png`);
    await fs.promises.writeFile(pngPath, chart.png);
    written.push(pngPath);
  }
  for (const chart of charts) {
    await fs.promises.writeFile(path.join(directory, `${chart.name}.svg`), chart.svg, "utf-8");
  }
  return written;
};
