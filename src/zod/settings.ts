// Zod schemas for flowline settings

import { z } from "zod";
import type {
  MaterializerSettings,
  WorkerSystemSettings,
} from "../types/settings";
import {
  MATERIALIZER_DEFAULTS,
  WORKER_SYSTEM_DEFAULTS,
} from "../types/settings";
import { FlowError, FlowErrorCodes } from "../utils/errors";

/**
 * Worker system settings schema
 */
export const WorkerSystemSettingsSchema = z.object({
  name: z
    .string()
    .min(1)
    .regex(/^[^/]+$/, "must not contain '/'"),
  creationTimeoutMs: z.number().int().positive(),
  defaultDispatcher: z.string().min(1),
}) satisfies z.ZodType<WorkerSystemSettings>;

/**
 * Materializer settings schema
 */
export const MaterializerSettingsSchema = z
  .object({
    initialInputBufferSize: z.number().int().positive(),
    maximumInputBufferSize: z.number().int().positive(),
    dispatcher: z.string().min(1),
    namePrefix: z.string().min(1),
  })
  .refine((s) => s.initialInputBufferSize <= s.maximumInputBufferSize, {
    message: "initialInputBufferSize must not exceed maximumInputBufferSize",
    path: ["initialInputBufferSize"],
  }) satisfies z.ZodType<MaterializerSettings>;

function invalidSettings(scope: string, error: z.ZodError): FlowError {
  const issues = error.issues.map(
    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
  );
  return new FlowError(`Invalid ${scope} settings: ${issues.join("; ")}`, {
    code: FlowErrorCodes.INVALID_SETTINGS,
    metadata: { issues },
  });
}

/**
 * Merge partial settings over the defaults and validate the result
 */
export function resolveWorkerSystemSettings(
  settings: Partial<WorkerSystemSettings> = {},
): WorkerSystemSettings {
  const result = WorkerSystemSettingsSchema.safeParse({
    ...WORKER_SYSTEM_DEFAULTS,
    ...settings,
  });
  if (!result.success) throw invalidSettings("worker system", result.error);
  return result.data;
}

/**
 * Merge partial settings over the defaults and validate the result
 */
export function resolveMaterializerSettings(
  settings: Partial<MaterializerSettings> = {},
): MaterializerSettings {
  const result = MaterializerSettingsSchema.safeParse({
    ...MATERIALIZER_DEFAULTS,
    ...settings,
  });
  if (!result.success) throw invalidSettings("materializer", result.error);
  return result.data;
}
