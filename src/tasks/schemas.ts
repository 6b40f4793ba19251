import { z } from "zod";

export const TEXT_OPERATIONS = ["uppercase", "lowercase", "word_count", "echo"] as const;
export type TextOperation = (typeof TEXT_OPERATIONS)[number];

export const HTTP_METHODS = ["GET", "POST", "PUT", "PATCH", "DELETE"] as const;

export const MAX_DELAY_MS = 60_000;
export const MAX_WORKFLOW_STEPS = 50;

// Unknown operations are accepted here and rejected by the dispatcher as
// UNSUPPORTED_OPERATION, so the failure is recorded on the task.
export const textProcessingInputSchema = z.object({
  operation: z.string().min(1),
  text: z.string()
});

export const apiCallInputSchema = z.object({
  method: z.enum(HTTP_METHODS).default("GET"),
  url: z.string().url(),
  headers: z.record(z.string()).optional(),
  body: z.unknown().optional()
});

export const workflowStepSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("delay"), ms: z.number().int().min(0).max(MAX_DELAY_MS) }),
  z.object({ type: z.literal("log"), message: z.string() }),
  z.object({ type: z.literal("text_processing"), input: textProcessingInputSchema }),
  z.object({ type: z.literal("api_call"), input: apiCallInputSchema })
]);

export const workflowInputSchema = z.object({
  steps: z.array(workflowStepSchema).min(1).max(MAX_WORKFLOW_STEPS)
});

export const taskSpecSchema = z.discriminatedUnion("task_type", [
  z.object({ task_type: z.literal("text_processing"), input: textProcessingInputSchema }),
  z.object({ task_type: z.literal("api_call"), input: apiCallInputSchema }),
  z.object({ task_type: z.literal("workflow"), input: workflowInputSchema })
]);

export const taskSettingsSchema = z.object({
  agent_id: z.string().min(1),
  priority: z.number().int().min(1).max(10).default(5),
  max_retries: z.number().int().min(0).max(10).default(3),
  timeout_seconds: z.number().int().min(1).max(3600).default(300),
  tenant_id: z.string().optional()
});

export const createTaskSchema = z.intersection(taskSettingsSchema, taskSpecSchema);

export const TASK_STATUSES = ["pending", "running", "completed", "failed", "cancelled"] as const;

export const listTasksQuerySchema = z.object({
  status: z.enum(TASK_STATUSES).optional(),
  agent_id: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional()
});

export type TextProcessingInput = z.infer<typeof textProcessingInputSchema>;
export type ApiCallInput = z.infer<typeof apiCallInputSchema>;
export type WorkflowStep = z.infer<typeof workflowStepSchema>;
export type TaskSpec = z.infer<typeof taskSpecSchema>;
export type TaskType = TaskSpec["task_type"];
export type CreateTaskInput = z.input<typeof createTaskSchema>;
