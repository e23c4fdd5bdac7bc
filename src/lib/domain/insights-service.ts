import type { CurriculumStore } from "@/lib/data/curriculum-store";
import { detectCyclesReport, type DetectCyclesOptions } from "@/lib/domain/cycle-detector";
import { completedSet, recommendDisciplines } from "@/lib/domain/eligibility";
import { planGraduationPathReport } from "@/lib/domain/graduation-path";
import { analyzeImportance } from "@/lib/domain/importance-analyzer";
import { buildPrereqGraph, toGraphView } from "@/lib/domain/prereq-graph";
import { buildProgressView, type SpringLayoutOptions } from "@/lib/domain/progress-layout";
import type {
  CycleReport,
  DisciplineId,
  DisciplineRecommendation,
  EnrollmentRecord,
  EnrollmentStatus,
  GraduationPathReport,
  GraphView,
  ImportanceMetric,
  PrereqGraph,
  ProgressView
} from "@/types/curriculum";

async function loadGraph(store: CurriculumStore): Promise<PrereqGraph> {
  return buildPrereqGraph(await store.loadSnapshot());
}

async function loadStudentEnrollments(store: CurriculumStore, userId: number): Promise<EnrollmentRecord[] | null> {
  const profileId = await store.findStudentProfileId(userId);
  if (profileId === null) {
    return null;
  }
  return store.loadEnrollments(profileId);
}

export async function getCycles(store: CurriculumStore, options: DetectCyclesOptions = {}): Promise<CycleReport> {
  return detectCyclesReport(await loadGraph(store), options);
}

export async function getImportance(store: CurriculumStore): Promise<ImportanceMetric[]> {
  return analyzeImportance(await loadGraph(store));
}

export async function getGraph(store: CurriculumStore): Promise<GraphView> {
  return toGraphView(await loadGraph(store));
}

export async function getRecommendations(store: CurriculumStore, userId: number): Promise<DisciplineRecommendation[]> {
  const enrollments = await loadStudentEnrollments(store, userId);
  if (enrollments === null) {
    return [];
  }
  return recommendDisciplines(await loadGraph(store), completedSet(enrollments));
}

export async function getGraduationPath(
  store: CurriculumStore,
  userId: number,
  requiredIds: readonly DisciplineId[]
): Promise<GraduationPathReport> {
  const enrollments = await loadStudentEnrollments(store, userId);
  if (enrollments === null) {
    return { path: [], feasible: true, droppedIds: [] };
  }
  return planGraduationPathReport(await loadGraph(store), completedSet(enrollments), requiredIds);
}

export async function getProgress(
  store: CurriculumStore,
  userId: number,
  options: SpringLayoutOptions = {}
): Promise<ProgressView> {
  const enrollments = await loadStudentEnrollments(store, userId);
  if (enrollments === null) {
    return { positions: {}, statuses: {}, labels: {} };
  }
  const statusMap = new Map<DisciplineId, EnrollmentStatus>(
    enrollments.map((record) => [record.disciplineId, record.status])
  );
  return buildProgressView(await loadGraph(store), statusMap, options);
}
