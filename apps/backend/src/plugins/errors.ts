import fp from "fastify-plugin";
import { ZodError } from "zod";
import { ResearchError } from "@wiki-research/core";

/**
 * Consistent error shaping: `{ error: { code, message, detail? } }`.
 * Internal details are only exposed outside production.
 */
export default fp(
  async (app) => {
    app.setErrorHandler((error, req, rep) => {
      if (error instanceof ZodError) {
        return rep.status(400).send({
          error: {
            code: "invalid_request",
            message: "Request validation failed",
            issues: error.issues.map((issue) => ({
              path: issue.path.join("."),
              message: issue.message,
            })),
          },
        });
      }

      if (error instanceof ResearchError && error.code === "INVALID_TOPIC") {
        return rep.status(400).send({
          error: { code: "invalid_topic", message: error.message },
        });
      }

      const statusCode = error.statusCode ?? 500;
      if (statusCode < 500) {
        return rep.status(statusCode).send({
          error: { code: error.code ?? "bad_request", message: error.message },
        });
      }

      const isDev = process.env.NODE_ENV !== "production";
      req.log.error({ err: error, url: req.url }, "request failed");
      return rep.status(statusCode).send({
        error: {
          code: "internal_error",
          message: "Internal server error",
          ...(isDev ? { detail: error.message } : {}),
        },
      });
    });

    app.setNotFoundHandler((req, rep) => {
      return rep.status(404).send({
        error: { code: "not_found", message: `Route ${req.method} ${req.url} not found` },
      });
    });
  },
  { name: "errors" }
);
