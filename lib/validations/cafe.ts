import { z } from "zod";

const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .nullish()
    .transform((value) => (value ? value : null));

/**
 * Body of POST /api/cafes and PUT /api/cafes/[id]
 */
export const cafeInputSchema = z
  .object({
    name: z.string().trim().min(1, "Name is required").max(255),
    city: z.string().trim().min(1, "City is required").max(100),
    address: optionalText(255),
    openingHours: optionalText(100),
    description: z.string().trim().min(1, "Description is required"),
    imageUrl: z
      .union([z.literal(""), z.string().trim().url("Image URL must be a valid URL").max(500)])
      .nullish()
      .transform((value) => (value ? value : null)),
    bestFor: z.string().trim().min(1, "Best For category is required"),
    alsoGoodFor: z
      .array(z.string().trim().min(1))
      .default([])
      .transform((names) => Array.from(new Set(names))),
  })
  .refine((cafe) => !cafe.alsoGoodFor.includes(cafe.bestFor), {
    message: "Best For category cannot also be listed under Also good for",
    path: ["alsoGoodFor"],
  });

export type CafeInput = z.infer<typeof cafeInputSchema>;

/** Path id: decimal digits only, so "0x1", "1e0" and " 1" are rejected */
export const cafeIdSchema = z
  .string()
  .regex(/^\d+$/, "Cafe id must be a positive integer")
  .transform(Number)
  .pipe(z.number().int().positive("Cafe id must be positive").max(Number.MAX_SAFE_INTEGER));
