import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import type {
  CurriculumSnapshot,
  DisciplineRecord,
  EnrollmentRecord,
  PrerequisiteRecord,
  StudentProfileRecord
} from "@/types/curriculum";

/** Read-only view of the relational data the insights need. */
export interface CurriculumStore {
  loadSnapshot(): Promise<CurriculumSnapshot>;
  findStudentProfileId(userId: number): Promise<number | null>;
  loadEnrollments(profileId: number): Promise<EnrollmentRecord[]>;
}

export class CurriculumDataError extends Error {
  constructor(
    readonly file: string,
    message: string
  ) {
    super(`Dados curriculares inválidos em ${file}: ${message}`);
    this.name = "CurriculumDataError";
  }
}

const idSchema = z.number().int();

const disciplinesSchema = z.array(z.object({ id: idSchema, name: z.string() }));

const prerequisitesSchema = z.array(
  z.object({
    disciplineId: idSchema.nullable(),
    prerequisiteId: idSchema.nullable()
  })
);

const studentsSchema = z.array(z.object({ profileId: idSchema, userId: idSchema }));

const enrollmentsSchema = z.array(
  z.object({
    studentId: idSchema,
    disciplineId: idSchema,
    status: z.enum(["pending", "in_progress", "completed"] as const)
  })
);

export const CURRICULUM_FILES = {
  disciplines: "disciplines.json",
  prerequisites: "prerequisites.json",
  students: "students.json",
  enrollments: "enrollments.json"
} as const;

async function readOptionalJson(absolutePath: string): Promise<unknown> {
  try {
    const payload = await readFile(absolutePath, "utf8");
    return JSON.parse(payload) as unknown;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return [];
    }
    if (error instanceof SyntaxError) {
      throw new CurriculumDataError(path.basename(absolutePath), error.message);
    }
    throw error;
  }
}

/**
 * Curriculum data kept as JSON files in one directory. Files are read on every call,
 * so each analysis sees the data as it is on disk at that moment. A missing file counts as an empty list.
 */
export class JsonCurriculumStore implements CurriculumStore {
  constructor(private readonly dataDir: string) {}

  private async readList<T>(file: string, schema: z.ZodType<T[], z.ZodTypeDef, unknown>): Promise<T[]> {
    const raw = await readOptionalJson(path.join(this.dataDir, file));
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const [issue] = parsed.error.issues;
      const location = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      throw new CurriculumDataError(file, `${location}${issue.message}`);
    }
    return parsed.data;
  }

  async loadSnapshot(): Promise<CurriculumSnapshot> {
    const [disciplines, prerequisites] = await Promise.all([
      this.readList<DisciplineRecord>(CURRICULUM_FILES.disciplines, disciplinesSchema),
      this.readList<PrerequisiteRecord>(CURRICULUM_FILES.prerequisites, prerequisitesSchema)
    ]);
    return { disciplines, prerequisites };
  }

  async findStudentProfileId(userId: number): Promise<number | null> {
    const students = await this.readList<StudentProfileRecord>(CURRICULUM_FILES.students, studentsSchema);
    return students.find((student) => student.userId === userId)?.profileId ?? null;
  }

  async loadEnrollments(profileId: number): Promise<EnrollmentRecord[]> {
    const enrollments = await this.readList<EnrollmentRecord>(CURRICULUM_FILES.enrollments, enrollmentsSchema);
    return enrollments.filter((record) => record.studentId === profileId);
  }
}

export interface InMemoryCurriculumData {
  disciplines?: DisciplineRecord[];
  prerequisites?: PrerequisiteRecord[];
  students?: StudentProfileRecord[];
  enrollments?: EnrollmentRecord[];
}

export class InMemoryCurriculumStore implements CurriculumStore {
  constructor(private readonly data: InMemoryCurriculumData = {}) {}

  async loadSnapshot(): Promise<CurriculumSnapshot> {
    return {
      disciplines: [...(this.data.disciplines ?? [])],
      prerequisites: [...(this.data.prerequisites ?? [])]
    };
  }

  async findStudentProfileId(userId: number): Promise<number | null> {
    return (this.data.students ?? []).find((student) => student.userId === userId)?.profileId ?? null;
  }

  async loadEnrollments(profileId: number): Promise<EnrollmentRecord[]> {
    return (this.data.enrollments ?? []).filter((record) => record.studentId === profileId);
  }
}
