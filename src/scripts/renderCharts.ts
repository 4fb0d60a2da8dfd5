import path from "path";
import { writeCharts } from "../services/chartRenderer";
import { buildChartSet } from "../services/charts";
import { loadDataset } from "../services/datasetStore";
import { loadConfig } from "../utils/config";
import logger from "../utils/logger";

async function main() {
  const config = loadConfig();
  const dataset = await loadDataset(config.datasetPath, config.referenceDate);
  const written = await writeCharts(path.join(config.exportDir, "charts"), buildChartSet(dataset.rows));
  logger.info(`Rendered ${written.length} charts`);
}

main().catch((err) => {
  logger.error("Chart rendering failed", err);
  process.exit(1);
});
