import { z } from 'zod';

import { StageStatus } from '../domain/stageStatus.js';

// ---- persistence service (spreadsheet web app) ----

const rawRecordSchema = z.record(z.string(), z.unknown());

export const persistenceListResponseSchema = z.object({
  ok: z.boolean(),
  data: z.array(rawRecordSchema).nullish(),
  rows: z.array(rawRecordSchema).nullish(), // older deployments
  error: z.string().nullish(),
});

export const persistenceSubmitResponseSchema = z.object({
  ok: z.boolean(),
  request_id: z.union([z.string(), z.number()]).nullish(),
  error: z.string().nullish(),
});

export const persistenceUpdateResponseSchema = z.object({
  ok: z.boolean(),
  error: z.string().nullish(),
});

// ---- backend-api <-> web ----

export const loginBodySchema = z.object({
  password: z.string().min(1).max(500),
});

export const uploadFileSchema = z.object({
  name: z.string().min(1).max(500),
  mime: z.string().max(200).nullish(),
  base64Payload: z.string().min(1),
});

export const submitRequestBodySchema = z.object({
  uploadDate: z.string().max(40).nullish(),
  shipReference: z.string().max(200).nullish(),
  title: z.string().max(1000),
  files: z.array(uploadFileSchema).max(50),
});

export type SubmitRequestBody = z.infer<typeof submitRequestBodySchema>;

export const stageInputSchema = z.object({
  status: z.string().max(100),
  date: z.string().max(40).nullish(),
});

export type StageInput = z.infer<typeof stageInputSchema>;

export const updateStagesBodySchema = z.object({
  stages: z
    .object({
      Evaluation: stageInputSchema.optional(),
      ProposalLetter: stageInputSchema.optional(),
      ApprovalLetter: stageInputSchema.optional(),
      DeliveryOrderCert: stageInputSchema.optional(),
      PurchaseOrder: stageInputSchema.optional(),
      Paid: stageInputSchema.optional(),
      Supply: stageInputSchema.optional(),
    })
    .strict(),
});

export type UpdateStagesBody = z.infer<typeof updateStagesBodySchema>;

export const stageStateSchema = z.object({
  status: z.enum([StageStatus.None, StageStatus.InProcess, StageStatus.Done]),
  date: z.string().nullable(),
});

export const fileRefSchema = z.object({
  name: z.string(),
  mime: z.string().nullish(),
  downloadUrl: z.string().nullish(),
  viewUrl: z.string().nullish(),
  fileId: z.union([z.string(), z.number()]).nullish(),
  id: z.union([z.string(), z.number()]).nullish(),
});

export const procurementRequestSchema = z.object({
  requestId: z.string(),
  uploadDate: z.string().nullable(),
  shipReference: z.string(),
  title: z.string(),
  attachments: z.array(fileRefSchema),
  stages: z.object({
    Evaluation: stageStateSchema,
    ProposalLetter: stageStateSchema,
    ApprovalLetter: stageStateSchema,
    DeliveryOrderCert: stageStateSchema,
    PurchaseOrder: stageStateSchema,
    Paid: stageStateSchema,
    Supply: stageStateSchema,
  }),
  lastUpdate: z.string().nullable(),
});

export const failureKindSchema = z.enum(['transport', 'application', 'validation']);

export type FailureKind = z.infer<typeof failureKindSchema>;

export const apiFailureSchema = z.object({
  ok: z.literal(false),
  error: z.string(),
  kind: failureKindSchema.optional(),
});

export type ApiFailure = z.infer<typeof apiFailureSchema>;

export const loginResponseSchema = z.object({
  ok: z.literal(true),
  token: z.string(),
  session: z.object({ authenticated: z.boolean() }),
});

export const sessionResponseSchema = z.object({
  ok: z.literal(true),
  session: z.object({ authenticated: z.boolean() }),
});

export const requestsListResponseSchema = z.object({
  ok: z.literal(true),
  requests: z.array(procurementRequestSchema),
});

export const submitResponseSchema = z.object({
  ok: z.literal(true),
  requestId: z.string(),
});

export const okResponseSchema = z.object({
  ok: z.literal(true),
});
