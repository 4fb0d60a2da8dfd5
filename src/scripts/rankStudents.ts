import path from "path";
import { loadCurriculum } from "../models/Curriculum";
import { Table, loadDataset, writeTable } from "../services/datasetStore";
import { groupedRankingTable, rankingTable } from "../services/exportTables";
import { creditWeightedScheme, rankStudents, rankWithinGroups } from "../services/ranking";
import { loadConfig } from "../utils/config";
import logger from "../utils/logger";

async function main() {
  const config = loadConfig();
  const dataset = await loadDataset(config.datasetPath, config.referenceDate);
  const scheme = creditWeightedScheme(loadCurriculum());

  const general = rankStudents(dataset.rows, scheme);
  for (const entry of general.slice(0, 10)) {
    logger.info(`#${entry.rank} ${entry.studentId} ${entry.lastName} ${entry.firstName}: ${entry.score.toFixed(2)}`);
  }

  const exports: Array<[string, Table]> = [
    ["ranking-general.csv", rankingTable(general)],
    ["ranking-department.csv", groupedRankingTable("department", rankWithinGroups(dataset.rows, "department", scheme))],
    ["ranking-program-level.csv", groupedRankingTable("programLevel", rankWithinGroups(dataset.rows, "programLevel", scheme))],
    ["ranking-subject.csv", groupedRankingTable("courseCode", rankWithinGroups(dataset.rows, "subject", scheme))],
  ];
  for (const [fileName, table] of exports) {
    const target = path.join(config.exportDir, fileName);
    await writeTable(target, table);
    logger.info(`Wrote ${table.rows.length} ranking rows to ${target}`);
  }
}

main().catch((err) => {
  logger.error("Ranking failed", err);
  process.exit(1);
});
