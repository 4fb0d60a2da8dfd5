import { loadCurriculum } from "../models/Curriculum";
import { generateDataset, writeDataset } from "../services/datasetGenerator";
import { loadConfig } from "../utils/config";
import logger from "../utils/logger";

async function main() {
  const config = loadConfig();
  const curriculum = loadCurriculum();
  logger.info(`Generating ${config.studentCount} students (seed ${config.randomSeed})`);

  const rows = generateDataset(
    {
      studentCount: config.studentCount,
      seed: config.randomSeed,
      academicYear: config.academicYear,
      mean: config.gradeMean,
      standardDeviation: config.gradeStd,
      missingRate: config.missingRate,
    },
    curriculum
  );
  const { csv, xlsx } = await writeDataset(config.datasetPath, rows);
  logger.info(`Dataset generated: ${rows.length} grades → ${csv}, ${xlsx}`);
}

main().catch((err) => {
  logger.error("Dataset generation failed", err);
  process.exit(1);
});
