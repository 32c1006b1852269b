import express, { type Express, type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import * as path from "path";
import { nanoid } from "nanoid";
import type { AppConfig } from "./config";
import { HttpError, errorMessage } from "./errors";
import { readReportFile, type IJobStorage } from "./job-storage";
import { logger } from "./logger";
import { isZipFilename, type UploadManager } from "./upload-manager";

export interface RouteDeps {
  config: AppConfig;
  storage: IJobStorage;
  uploads: UploadManager;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error middleware
const asyncRoute = (handler: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
  handler(req, res).catch(next);
};

export function registerRoutes(app: Express, { config, storage, uploads }: RouteDeps): void {
  const upload = multer({
    storage: multer.diskStorage({
      destination: (_req, _file, cb) => cb(null, uploads.getIncomingDir()),
      filename: (_req, _file, cb) => cb(null, `${nanoid()}.zip`),
    }),
    limits: { fileSize: config.maxUploadBytes, files: 1 },
    fileFilter: (_req, file, cb) => {
      if (!isZipFilename(file.originalname)) {
        cb(new HttpError(400, "Upload must be a .zip file containing DICOM files."));
        return;
      }
      cb(null, true);
    },
  });

  app.post(
    "/api/uploads",
    upload.single("zipfile"),
    asyncRoute(async (req, res) => {
      if (!req.file) {
        throw new HttpError(400, "Please choose a ZIP file.");
      }
      const outcome = await uploads.processUpload({
        originalName: req.file.originalname,
        tempPath: req.file.path,
      });
      res.status(outcome.report.status === "ok" ? 201 : 422).json(outcome);
    }),
  );

  app.get(
    "/api/jobs",
    asyncRoute(async (_req, res) => {
      res.json(await storage.listJobs());
    }),
  );

  const loadReport = async (jobId: string) => {
    const job = await storage.getJob(jobId);
    if (!job) throw new HttpError(404, "Job not found.");
    const report = job.reportPath ? await readReportFile(job.reportPath) : null;
    if (!job.reportPath || !report) throw new HttpError(404, "Report not found yet.");
    return { job, reportPath: job.reportPath, report };
  };

  app.get(
    "/api/jobs/:jobId/report",
    asyncRoute(async (req, res) => {
      const { job, report } = await loadReport(req.params.jobId);
      res.json({ job, report });
    }),
  );

  app.get(
    "/api/jobs/:jobId/report/download",
    asyncRoute(async (req, res) => {
      const { job, reportPath } = await loadReport(req.params.jobId);
      res.download(path.resolve(reportPath), `phantom_qa_report_${job.id}.json`);
    }),
  );

  app.use("/plots", express.static(config.plotsDir));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      const status = err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
      res.status(status).json({ message: err.message });
      return;
    }
    if (err instanceof HttpError) {
      res.status(err.status).json({ message: err.message });
      return;
    }
    logger.error(err, "routes");
    res.status(500).json({ message: errorMessage(err) || "Internal server error" });
  });
}
