import { z } from "zod";

/**
 * Wire schemas. Field names are snake_case on the wire.
 */

export const QueryRequestSchema = z.object({
  user_id: z.string().min(1),
  query: z.string().min(1),
  time: z.string().optional(),
});

export const UploadMessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
});

export const UploadRequestSchema = z
  .object({
    user_id: z.string().min(1),
    messages: z.array(UploadMessageSchema).optional(),
    multifiles: z.array(z.string()).optional(),
    time: z.string().optional(),
  })
  .refine((body) => (body.messages?.length ?? 0) > 0 || (body.multifiles?.length ?? 0) > 0, {
    message: "messages or multifiles is required",
  });

export type QueryRequest = z.infer<typeof QueryRequestSchema>;
export type UploadRequest = z.infer<typeof UploadRequestSchema>;
