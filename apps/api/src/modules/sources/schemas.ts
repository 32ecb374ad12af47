import { z } from "zod";

function coordinate(min: number, max: number) {
  return z
    .union([
      z.number(),
      z
        .string()
        .trim()
        .min(1)
        .transform((value) => Number(value))
    ])
    .pipe(z.number().finite().min(min).max(max));
}

export const nearestSourceBodySchema = z.object({
  latitude: coordinate(-90, 90),
  longitude: coordinate(-180, 180)
});

export type NearestSourceBody = z.infer<typeof nearestSourceBodySchema>;

export const sourceKeyParamsSchema = z.object({
  key: z.string().trim().toLowerCase().min(1)
});

export const sourceResponseSchema = z.object({
  key: z.string(),
  name: z.string(),
  location: z
    .object({
      latitude: z.number(),
      longitude: z.number(),
      city: z.string()
    })
    .nullable()
});

export type SourceResponse = z.infer<typeof sourceResponseSchema>;

export const nearestSourceResponseSchema = z.object({
  key: z.string(),
  name: z.string(),
  city: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  distanceKm: z.number().nonnegative()
});
