// server/src/utils/ids.ts
/** Request correlation ids + entity id helpers. */

import { randomUUID } from "crypto";

import type { RequestHandler } from "express";
import mongoose from "mongoose";

export const requestId: RequestHandler = (req, res, next) => {
  const id = randomUUID();
  // store on res.locals to avoid extending Request types
  res.locals.requestId = id;
  res.setHeader("x-request-id", id);
  next();
};

/** 24-hex ObjectId string, whatever the store driver. */
export function newEntityId(): string {
  return new mongoose.Types.ObjectId().toHexString();
}

export function isEntityId(id: string): boolean {
  return /^[0-9a-f]{24}$/i.test(id);
}
