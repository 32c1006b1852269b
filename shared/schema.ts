import { z } from "zod";

// Placeholder rendered in place of an absent metric value
export const VALUE_PLACEHOLDER = "—";

export const metricStatusSchema = z.enum(["pass", "fail", "na"]);
export const reportStatusSchema = z.enum(["ok", "error"]);

export const metricRowSchema = z.object({
  label: z.string(),
  value: z.string(),
  expected: z.string(),
  status: metricStatusSchema,
  notes: z.string(),
});

export const keyValueRowSchema = z.object({
  label: z.string(),
  value: z.string(),
});

export const keyValueSectionSchema = z.object({
  kind: z.literal("kv"),
  name: z.string(),
  rows: z.array(keyValueRowSchema),
});

export const metricsSectionSchema = z.object({
  kind: z.literal("metrics"),
  name: z.string(),
  rows: z.array(metricRowSchema),
});

export const sectionSchema = z.discriminatedUnion("kind", [
  keyValueSectionSchema,
  metricsSectionSchema,
]);

export const plotSpecSchema = z.object({
  title: z.string(),
  fileName: z.string(),
  url: z.string(),
});

export const reportSchema = z.object({
  title: z.string(),
  status: reportStatusSchema,
  message: z.string(),
  plots: z.array(plotSpecSchema),
  sections: z.array(sectionSchema),
});

// Upload jobs tracked by the HTTP layer
export const uploadJobSchema = z.object({
  id: z.string(),
  originalFilename: z.string(),
  storedPath: z.string(),
  workDir: z.string(),
  reportPath: z.string().nullable(),
  reportStatus: reportStatusSchema.nullable(),
  createdAt: z.coerce.date(),
});

export const insertUploadJobSchema = uploadJobSchema.omit({
  id: true,
  reportPath: true,
  reportStatus: true,
  createdAt: true,
});

export type MetricStatus = z.infer<typeof metricStatusSchema>;
export type ReportStatus = z.infer<typeof reportStatusSchema>;
export type MetricRow = z.infer<typeof metricRowSchema>;
export type KeyValueRow = z.infer<typeof keyValueRowSchema>;
export type KeyValueSection = z.infer<typeof keyValueSectionSchema>;
export type MetricsSection = z.infer<typeof metricsSectionSchema>;
export type Section = z.infer<typeof sectionSchema>;
export type PlotSpec = z.infer<typeof plotSpecSchema>;
export type Report = z.infer<typeof reportSchema>;
export type UploadJob = z.infer<typeof uploadJobSchema>;
export type InsertUploadJob = z.infer<typeof insertUploadJobSchema>;
