import fs from 'fs';
import path from 'path';
import { nanoid } from 'nanoid';
import {
  reportSchema,
  type InsertUploadJob,
  type Report,
  type ReportStatus,
  type UploadJob,
} from '@shared/schema';

export interface IJobStorage {
  createJob(job: InsertUploadJob & { id?: string }): Promise<UploadJob>;
  getJob(id: string): Promise<UploadJob | undefined>;
  listJobs(): Promise<UploadJob[]>;
  attachReport(id: string, reportPath: string, status: ReportStatus): Promise<UploadJob>;
}

/**
 * Process-local job records. Jobs are lost on restart; the report files they
 * point at stay on disk.
 */
export class MemJobStorage implements IJobStorage {
  private jobs = new Map<string, UploadJob>();

  async createJob(job: InsertUploadJob & { id?: string }): Promise<UploadJob> {
    const record: UploadJob = {
      id: job.id ?? nanoid(),
      originalFilename: job.originalFilename,
      storedPath: job.storedPath,
      workDir: job.workDir,
      reportPath: null,
      reportStatus: null,
      createdAt: new Date(),
    };
    this.jobs.set(record.id, record);
    return record;
  }

  async getJob(id: string): Promise<UploadJob | undefined> {
    return this.jobs.get(id);
  }

  async listJobs(): Promise<UploadJob[]> {
    return Array.from(this.jobs.values()).sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async attachReport(id: string, reportPath: string, status: ReportStatus): Promise<UploadJob> {
    const job = this.jobs.get(id);
    if (!job) throw new Error(`Unknown job ${id}`);
    const updated: UploadJob = { ...job, reportPath, reportStatus: status };
    this.jobs.set(id, updated);
    return updated;
  }
}

export const reportFileName = (jobId: string) => `report_${jobId}.json`;

export async function writeReportFile(reportsDir: string, jobId: string, report: Report): Promise<string> {
  await fs.promises.mkdir(reportsDir, { recursive: true });
  const reportPath = path.join(reportsDir, reportFileName(jobId));
  await fs.promises.writeFile(reportPath, JSON.stringify(report, null, 2), 'utf-8');
  return reportPath;
}

/** Read a stored report back; returns null when missing or not a valid report. */
export async function readReportFile(reportPath: string): Promise<Report | null> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(reportPath, 'utf-8');
  } catch {
    return null;
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = reportSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}
