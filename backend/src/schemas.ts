import { z } from "zod";

// Shape only; token and size checks live in the board parser so errors name the square.
const boardSchema = z.array(z.array(z.string()));

const colorCodeSchema = z.enum(["w", "b"]);

export const movesRequestSchema = z.object({
  board: boardSchema,
  color: colorCodeSchema,
  square: z
    .string()
    .regex(/^[a-h][1-8]$/, "Square must be written as file and rank, e.g. e2")
    .optional()
});

export type MovesRequest = z.infer<typeof movesRequestSchema>;

export const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("analyze"),
    requestId: z.string().min(1),
    board: boardSchema,
    color: colorCodeSchema
  }),
  z.object({
    type: z.literal("ping")
  })
] as const);
