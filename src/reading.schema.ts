import { z } from "zod";
import { classifyAirQuality } from "./air-quality.js";
import { celsiusToFahrenheit } from "./sensors.js";
import type { Reading } from "./types.js";

export const AirQualityStatusSchema = z.enum([
  "Good",
  "Moderate",
  "Unhealthy for Sensitive Groups",
  "Unhealthy",
  "Very Unhealthy",
  "Hazardous",
]);

export const ReadingSchema: z.ZodType<Reading> = z
  .object({
    timestamp: z.string(),

    temperature_celsius: z.number(),
    temperature_fahrenheit: z.number(),

    humidity_percent: z.number().min(0).max(100),

    air_quality_index: z.number().int().min(0),
    air_quality_status: AirQualityStatusSchema,
  })
  .strict()
  .superRefine((reading, ctx) => {
    if (reading.temperature_fahrenheit !== celsiusToFahrenheit(reading.temperature_celsius)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "temperature_fahrenheit does not match temperature_celsius",
        path: ["temperature_fahrenheit"],
      });
    }
    // min(0) only marks the record dirty, so the classifier can still see a negative index.
    if (
      reading.air_quality_index >= 0 &&
      reading.air_quality_status !== classifyAirQuality(reading.air_quality_index)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "air_quality_status does not match air_quality_index",
        path: ["air_quality_status"],
      });
    }
  });

export const HistorySchema = z.array(ReadingSchema);
