import { z } from "zod";

// Conversion schemas
export const ConvertArgsSchema = z.object({
  input: z.string().trim().min(1, "Missing input file"),
  output: z.string().trim().min(1).optional(),
  outDir: z.string().trim().min(1).optional(),
  force: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type ConvertArgs = z.infer<typeof ConvertArgsSchema>;
