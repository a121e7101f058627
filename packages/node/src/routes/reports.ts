/**
 * Platform reports.
 *
 * GET /api/v1/reports/platform/:month Monthly fee report (operator)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ReportMonthSchema } from "../types/dto.js";
import { formatZodErrors } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createReportRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/platform/:month", (c) => {
    const service = c.get("service");
    service.assertOperator(c.get("actor"));
    const month = ReportMonthSchema.safeParse(c.req.param("month"));
    if (!month.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid month", {
          issues: formatZodErrors(month.error),
        }),
        400,
      );
    }
    return c.json({ data: service.lifecycle.generatePlatformReport(month.data) });
  });

  return routes;
}
