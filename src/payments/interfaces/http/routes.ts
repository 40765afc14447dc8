import express, { Router } from "express";
import { WebhookController } from "./WebhookController";
import { asyncHandler } from "../../../shared/http/asyncHandler";
import { RouteRateLimiters } from "../../../shared/http/rateLimitMiddleware";

export const WEBHOOK_PAYMENT_PATH = "/api/v1/webhook/payment";

const optional = (handler: RouteRateLimiters["webhook"] | undefined) => (handler ? [handler] : []);

// Read as text: the signature covers the fields as written, which JSON.parse loses.
const rawJsonBody = express.text({
  type: ["application/json", "application/*+json"],
  limit: "16kb"
});

export const buildWebhookRoutes = (
  controller: WebhookController,
  rateLimiters?: Partial<RouteRateLimiters>
): Router => {
  const router = Router();
  router.post(
    WEBHOOK_PAYMENT_PATH,
    ...optional(rateLimiters?.webhook),
    rawJsonBody,
    asyncHandler(controller.handlePayment)
  );
  return router;
};
