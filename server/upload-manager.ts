import * as fs from 'fs';
import * as path from 'path';
import { nanoid } from 'nanoid';
import type { Report, UploadJob } from '@shared/schema';
import type { AppConfig } from './config';
import { HttpError } from './errors';
import type { IJobStorage } from './job-storage';
import { writeReportFile } from './job-storage';
import { logger } from './logger';
import { processArchive } from './qa/pipeline';
import type { DicomReader } from './qa/dicom-reader';

export interface IncomingUpload {
  originalName: string;
  tempPath: string;
}

export interface UploadOutcome {
  job: UploadJob;
  report: Report;
}

type UploadDirs = Pick<AppConfig, 'uploadDir' | 'reportsDir' | 'plotsDir'>;

export const isZipFilename = (name: string) => name.toLowerCase().endsWith('.zip');

// Keeps the original name readable without letting it pick a path
export const safeFilename = (name: string) => path.basename(name).replace(/[<>:"/\\|?*\x00-\x1f]/g, '_') || 'upload.zip';

export class UploadManager {
  private readonly incomingDir: string;

  constructor(
    private readonly dirs: UploadDirs,
    private readonly storage: IJobStorage,
    private readonly reader?: DicomReader,
  ) {
    this.incomingDir = path.join(dirs.uploadDir, 'incoming');
    this.ensureDirectories();
  }

  private ensureDirectories() {
    for (const dir of [this.dirs.uploadDir, this.incomingDir, this.dirs.reportsDir, this.dirs.plotsDir]) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  /** Where multer drops files before a job claims them. */
  getIncomingDir(): string {
    return this.incomingDir;
  }

  getJobDir(jobId: string): string {
    return path.join(this.dirs.uploadDir, jobId);
  }

  /**
   * Run the QA pipeline for one uploaded archive. Each job gets its own
   * working directory; plots share the plot directory under random names.
   */
  async processUpload(upload: IncomingUpload): Promise<UploadOutcome> {
    const filename = safeFilename(upload.originalName);
    if (!isZipFilename(filename)) {
      await fs.promises.rm(upload.tempPath, { force: true });
      throw new HttpError(400, 'Upload must be a .zip file containing DICOM files.');
    }

    const jobId = nanoid();
    const workDir = this.getJobDir(jobId);
    await fs.promises.mkdir(workDir, { recursive: true });
    const storedPath = path.join(workDir, filename);
    await fs.promises.rename(upload.tempPath, storedPath);

    const job = await this.storage.createJob({ id: jobId, originalFilename: filename, storedPath, workDir });
    logger.info(`Job ${jobId}: processing ${filename}`, 'upload');

    const result = await processArchive(storedPath, {
      workDir,
      plotDir: this.dirs.plotsDir,
      reader: this.reader,
    });

    const { extraction } = result;
    if (extraction.error) {
      logger.warn(`Job ${jobId}: archive read stopped early: ${extraction.error}`, 'upload');
    }
    for (const entry of extraction.skipped) {
      logger.warn(`Job ${jobId}: skipped archive entry ${entry.entryName} (${entry.reason})`, 'upload');
    }
    for (const file of result.skippedFiles) {
      logger.debug(`Job ${jobId}: skipped ${path.relative(workDir, file.path)} (${file.reason})`, 'upload');
    }

    const reportPath = await writeReportFile(this.dirs.reportsDir, jobId, result.report);
    const updated = await this.storage.attachReport(jobId, reportPath, result.report.status);

    logger.info(
      `Job ${jobId}: ${result.detected.length} DICOM file(s) detected, report ${result.report.status}`,
      'upload',
    );
    return { job: updated, report: result.report };
  }
}
