/**
 * Zod schemas for license registry responses.
 * Unknown fields are stripped.
 */
import { z } from 'zod';

/**
 * One entry of the license listing.
 */
export const LicenseSummarySchema = z.object({
  key: z.string(),
  name: z.string(),
  spdx_id: z.string(),
});

export const LicenseListSchema = z.array(LicenseSummarySchema);

/**
 * A single license with its template body.
 */
export const LicenseDetailSchema = z.object({
  name: z.string(),
  body: z.string(),
});

export type LicenseSummaryPayload = z.infer<typeof LicenseSummarySchema>;
export type LicenseDetailPayload = z.infer<typeof LicenseDetailSchema>;
