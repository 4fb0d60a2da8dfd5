import express from "express";
import { rankingController } from "../controllers/rankingController";
import { referenceController } from "../controllers/referenceController";
import { statsController } from "../controllers/statsController";
import { GradeRepository } from "../services/gradeRepository";

export const createApiRouter = (repository: GradeRepository) => {
  const router = express.Router();
  const reference = referenceController(repository);
  const stats = statsController(repository);
  const rankings = rankingController(repository);

  router.get("/health", reference.health);

  // Reference lists
  router.get("/departments", reference.departments);
  router.get("/programs", reference.programs);
  router.get("/teachers", reference.teachers);
  router.get("/subjects", reference.subjects);

  // Statistics
  router.get("/stats/global", stats.global);
  router.get("/stats/subjects", stats.subjects);
  router.get("/stats/subject/:courseCode", stats.subject);
  router.get("/stats/departments", stats.departments);
  router.get("/stats/program-level", stats.programLevel);
  router.get("/stats/teacher", stats.teacher);
  router.get("/stats/gender", stats.gender);
  router.get("/stats/age-bands", stats.ageBands);
  router.get("/stats/distribution", stats.distribution);

  // Rankings
  router.get("/rankings/general", rankings.general);
  router.get("/rankings/subject/:courseCode", rankings.subject);
  router.get("/rankings/department", rankings.department);
  router.get("/rankings/program-level", rankings.programLevel);

  return router;
};
