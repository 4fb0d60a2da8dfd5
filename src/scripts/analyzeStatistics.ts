import path from "path";
import { loadDataset, writeTable } from "../services/datasetStore";
import { statisticsTables } from "../services/exportTables";
import { globalStats } from "../services/statistics";
import { loadConfig } from "../utils/config";
import { formatNumber, formatPercent } from "../utils/format";
import logger from "../utils/logger";

async function main() {
  const config = loadConfig();
  const dataset = await loadDataset(config.datasetPath, config.referenceDate);

  const overall = globalStats(dataset.rows, config.passMark);
  logger.info(
    `Global: n=${overall.count} mean=${formatNumber(overall.mean)} median=${formatNumber(overall.median)} ` +
      `std=${formatNumber(overall.std)} pass rate=${formatPercent(overall.passRate)}`
  );

  for (const [fileName, table] of Object.entries(statisticsTables(dataset.rows, config.passMark))) {
    const target = path.join(config.exportDir, fileName);
    await writeTable(target, table);
    logger.info(`Wrote ${table.rows.length} rows to ${target}`);
  }
}

main().catch((err) => {
  logger.error("Statistical analysis failed", err);
  process.exit(1);
});
