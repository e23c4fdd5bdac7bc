export type DisciplineId = number;

export type EnrollmentStatus = "pending" | "in_progress" | "completed";

export type ProgressStatus = EnrollmentStatus | "not_associated";

export interface DisciplineRecord {
  id: DisciplineId;
  name: string;
}

export interface PrerequisiteRecord {
  disciplineId: DisciplineId | null;
  prerequisiteId: DisciplineId | null;
}

export interface StudentProfileRecord {
  profileId: number;
  userId: number;
}

export interface EnrollmentRecord {
  studentId: number;
  disciplineId: DisciplineId;
  status: EnrollmentStatus;
}

export interface CurriculumSnapshot {
  disciplines: DisciplineRecord[];
  prerequisites: PrerequisiteRecord[];
}

export interface PrereqGraphNode {
  id: DisciplineId;
  name: string;
  placeholder: boolean;
}

export interface PrereqGraphEdge {
  from: DisciplineId;
  to: DisciplineId;
}

export interface PrereqGraph {
  nodes: ReadonlyMap<DisciplineId, PrereqGraphNode>;
  outgoing: ReadonlyMap<DisciplineId, readonly DisciplineId[]>;
  incoming: ReadonlyMap<DisciplineId, readonly DisciplineId[]>;
}

export interface GraphView {
  nodes: Array<{ id: DisciplineId; name: string }>;
  edges: PrereqGraphEdge[];
}

export interface CycleReport {
  acyclic: boolean;
  cycles: DisciplineId[][];
  cyclesCount: number;
  truncated: boolean;
}

export interface ImportanceMetric {
  id: DisciplineId;
  name: string;
  outDegree: number;
  descendants: number;
  betweenness: number;
}

export interface DisciplineRecommendation {
  id: DisciplineId;
  name: string;
  prereqs: DisciplineId[];
}

export interface GraduationPathReport {
  path: DisciplineId[];
  feasible: boolean;
  droppedIds: DisciplineId[];
}

export type LayoutPoint = [number, number];

export interface ProgressView {
  positions: Record<DisciplineId, LayoutPoint>;
  statuses: Record<DisciplineId, ProgressStatus>;
  labels: Record<DisciplineId, string>;
}

export type InsightKind = "cycles" | "importance" | "graph" | "recommendations" | "graduation_path" | "progress";
