import fs from "fs-extra";
import path from "path";
import mongoose from "mongoose";
import { format, subDays } from "date-fns";
import { PersonAnalysisModel, type PersonAnalysisRecord } from "./models";
import type { AnalysisSummary, PersonAnalysis } from "./types/analysis";

/**
 * Persistence for finished analyses. Implementations return plain objects,
 * never database documents.
 */
export interface AnalysisStore {
  save(analysis: PersonAnalysis): Promise<void>;
  findById(id: string): Promise<PersonAnalysis | null>;
  findLatestByName(normalizedName: string, since: Date): Promise<PersonAnalysis | null>;
  listRecent(limit: number): Promise<AnalysisSummary[]>;
  deleteOlderThan(date: Date): Promise<number>;
}

export function toSummary(analysis: PersonAnalysis): AnalysisSummary {
  return {
    id: analysis.id,
    name: analysis.name,
    score: analysis.influence.score,
    grade: analysis.influence.grade,
    twitterHandle: analysis.twitterHandle,
    createdAt: analysis.createdAt,
  };
}

/**
 * In-process store, used when no MongoDB URI is configured.
 */
export class MemoryAnalysisStore implements AnalysisStore {
  private analyses: PersonAnalysis[] = [];

  async save(analysis: PersonAnalysis): Promise<void> {
    this.analyses = this.analyses.filter((existing) => existing.id !== analysis.id);
    this.analyses.push(analysis);
  }

  async findById(id: string): Promise<PersonAnalysis | null> {
    return this.analyses.find((analysis) => analysis.id === id) ?? null;
  }

  async findLatestByName(
    normalizedName: string,
    since: Date
  ): Promise<PersonAnalysis | null> {
    const matches = this.newestFirst().filter(
      (analysis) =>
        analysis.normalizedName === normalizedName &&
        Date.parse(analysis.createdAt) >= since.getTime()
    );
    return matches[0] ?? null;
  }

  async listRecent(limit: number): Promise<AnalysisSummary[]> {
    return this.newestFirst().slice(0, limit).map(toSummary);
  }

  async deleteOlderThan(date: Date): Promise<number> {
    const before = this.analyses.length;
    this.analyses = this.analyses.filter(
      (analysis) => Date.parse(analysis.createdAt) >= date.getTime()
    );
    return before - this.analyses.length;
  }

  private newestFirst(): PersonAnalysis[] {
    return [...this.analyses].sort(
      (a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt)
    );
  }
}

function fromRecord(record: PersonAnalysisRecord): PersonAnalysis {
  return {
    id: record.analysisId,
    name: record.name,
    normalizedName: record.normalizedName,
    imageUrl: record.imageUrl ?? null,
    details: record.details ?? null,
    twitterHandle: record.twitterHandle ?? null,
    twitter: record.twitter ?? null,
    news: record.news ?? null,
    influence: record.influence,
    warnings: record.warnings ?? [],
    createdAt: new Date(record.createdAt).toISOString(),
  };
}

export class MongoAnalysisStore implements AnalysisStore {
  async save(analysis: PersonAnalysis): Promise<void> {
    const { id, createdAt, ...rest } = analysis;
    await PersonAnalysisModel.create({
      ...rest,
      analysisId: id,
      createdAt: new Date(createdAt),
    });
  }

  async findById(id: string): Promise<PersonAnalysis | null> {
    const record = await PersonAnalysisModel.findOne({ analysisId: id })
      .lean<PersonAnalysisRecord>()
      .exec();
    return record ? fromRecord(record) : null;
  }

  async findLatestByName(
    normalizedName: string,
    since: Date
  ): Promise<PersonAnalysis | null> {
    const record = await PersonAnalysisModel.findOne({
      normalizedName,
      createdAt: { $gte: since },
    })
      .sort({ createdAt: -1 })
      .lean<PersonAnalysisRecord>()
      .exec();
    return record ? fromRecord(record) : null;
  }

  async listRecent(limit: number): Promise<AnalysisSummary[]> {
    const records = await PersonAnalysisModel.find()
      .sort({ createdAt: -1 })
      .limit(limit)
      .lean<PersonAnalysisRecord[]>()
      .exec();
    return records.map((record) => toSummary(fromRecord(record)));
  }

  async deleteOlderThan(date: Date): Promise<number> {
    const result = await PersonAnalysisModel.deleteMany({
      createdAt: { $lt: date },
    }).exec();
    return result.deletedCount;
  }
}

export async function connectDatabase(uri: string): Promise<void> {
  await mongoose.connect(uri);
  console.log("✅ Connected to MongoDB");
}

export async function disconnectDatabase(): Promise<void> {
  await mongoose.disconnect();
}

/**
 * Delete analyses older than the given number of days.
 */
export async function cleanupOldAnalyses(
  store: AnalysisStore,
  days = 30,
  now: Date = new Date()
): Promise<number> {
  const deletedCount = await store.deleteOlderThan(subDays(now, days));
  console.log(`🧹 Removed ${deletedCount} analyses older than ${days} days`);
  return deletedCount;
}

/**
 * Get the organized directory path for a person on a given day
 */
export function getAnalysisPath(logsDir: string, name: string, date: Date): string {
  const dateStr = format(date, "ddMMyyyy");
  const personDir = name.replace(/[^a-zA-Z0-9-_]/g, "_").toLowerCase();
  return path.join(logsDir, dateStr, personDir);
}

/**
 * Save an analysis as JSON under logs/DDMMYYYY/<name>/analysis.json
 */
export async function saveAnalysisToFile(
  analysis: PersonAnalysis,
  logsDir: string
): Promise<string> {
  const fullPath = getAnalysisPath(logsDir, analysis.name, new Date(analysis.createdAt));
  await fs.ensureDir(fullPath);

  const filePath = path.join(fullPath, "analysis.json");
  await fs.writeJson(filePath, analysis, { spaces: 2 });
  console.log(`✅ File saved: ${filePath}`);
  return filePath;
}

export async function loadAnalysisFromFile(
  logsDir: string,
  name: string,
  date: Date = new Date()
): Promise<PersonAnalysis | null> {
  const filePath = path.join(getAnalysisPath(logsDir, name, date), "analysis.json");

  if (!(await fs.pathExists(filePath))) {
    console.warn(`Analysis file not found: ${filePath}`);
    return null;
  }

  const data: PersonAnalysis = await fs.readJson(filePath);
  return data;
}
