import { z } from "zod";

/**
 * A cited source. The service adds fields freely, so unknown keys pass through.
 */
export const workspaceSourceSchema = z
  .object({
    title: z.string().optional(),
    text: z.string().optional(),
    url: z.string().optional(),
    score: z.number().optional(),
  })
  .passthrough();

export const chatResponseSchema = z
  .object({
    textResponse: z.string().nullish(),
    sources: z.array(workspaceSourceSchema).nullish(),
  })
  .passthrough();

export const workspaceInfoSchema = z
  .object({
    workspace: z
      .union([
        z.object({ name: z.string().optional(), slug: z.string().optional() }).passthrough(),
        z.array(z.object({ name: z.string().optional(), slug: z.string().optional() }).passthrough()),
      ])
      .nullish(),
  })
  .passthrough();

export type WorkspaceSource = z.infer<typeof workspaceSourceSchema>;
export type ChatResponse = z.infer<typeof chatResponseSchema>;
export type WorkspaceInfo = z.infer<typeof workspaceInfoSchema>;
