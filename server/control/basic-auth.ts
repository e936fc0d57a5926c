import { createHash, timingSafeEqual } from "node:crypto";
import type { NextFunction, Request, Response } from "express";
import type { BasicCredentials } from "../config/env";

export const AUTH_REALM = "Solar Clock";

const digest = (value: string): Buffer => createHash("sha256").update(value, "utf8").digest();

const sameSecret = (a: string, b: string): boolean => timingSafeEqual(digest(a), digest(b));

export const parseBasicAuth = (header: string | undefined): BasicCredentials | null => {
  if (!header) return null;
  const match = /^Basic\s+(\S+)$/i.exec(header.trim());
  const encoded = match?.[1];
  if (!encoded) return null;
  const decoded = Buffer.from(encoded, "base64").toString("utf8");
  const split = decoded.indexOf(":");
  if (split < 0) return null;
  return { user: decoded.slice(0, split), password: decoded.slice(split + 1) };
};

/** Basic auth gate; passes everything through when no credentials are configured. */
export const createBasicAuth = (expected: BasicCredentials | null) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expected) {
      next();
      return;
    }
    const supplied = parseBasicAuth(req.get("authorization"));
    if (supplied && sameSecret(supplied.user, expected.user) && sameSecret(supplied.password, expected.password)) {
      next();
      return;
    }
    res.setHeader("WWW-Authenticate", `Basic realm="${AUTH_REALM}"`);
    res.status(401).type("text/plain").send("Unauthorized");
  };
};
