import helmet from "helmet";
import type { RequestHandler } from "express";
import type { SecurityHeadersConfig } from "../config";

const PERMISSIONS_POLICY_VALUE = "geolocation=(), microphone=(), camera=(), payment=()";

export function createApiSecurityHeaders(config: SecurityHeadersConfig): RequestHandler {
  const helmetMiddleware = helmet({
    contentSecurityPolicy: {
      useDefaults: false,
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"]
      }
    },
    referrerPolicy: { policy: "no-referrer" },
    xFrameOptions: { action: "deny" },
    crossOriginResourcePolicy: { policy: "same-origin" },
    crossOriginEmbedderPolicy: false,
    hsts: config.isProduction
      ? {
          maxAge: 31536000,
          includeSubDomains: true
        }
      : false
  });

  return (req, res, next) => {
    if (!res.getHeader("Permissions-Policy")) {
      res.setHeader("Permissions-Policy", PERMISSIONS_POLICY_VALUE);
    }
    helmetMiddleware(req, res, next);
  };
}
