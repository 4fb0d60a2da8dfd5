import fs from "fs";
import path from "path";
import { loadCurriculum } from "../models/Curriculum";
import { loadDataset } from "../services/datasetStore";
import { creditWeightedScheme } from "../services/ranking";
import { createReportPdf } from "../services/reportService";
import { loadConfig } from "../utils/config";
import logger from "../utils/logger";

const REPORT_FILE = "grade-analysis-report.pdf";

async function main() {
  const config = loadConfig();
  const dataset = await loadDataset(config.datasetPath, config.referenceDate);

  // Dated at the reference date so that reruns on the same snapshot give the same file.
  const pdf = await createReportPdf(dataset.rows, {
    academicYear: config.academicYear,
    createdAt: config.referenceDate,
    passMark: config.passMark,
    scheme: creditWeightedScheme(loadCurriculum()),
  });

  const target = path.join(config.exportDir, REPORT_FILE);
  await fs.promises.mkdir(path.dirname(target), { recursive: true });
  await fs.promises.writeFile(target, pdf);
  logger.info(`Report written to ${target} (${pdf.length} bytes)`);
}

main().catch((err) => {
  logger.error("Report generation failed", err);
  process.exit(1);
});
