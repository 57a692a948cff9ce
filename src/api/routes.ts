import { Router } from "express";
import type { ErrorRequestHandler, NextFunction, Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import { Interpreter, InterpreterResponse } from "../plugin/createInterpreter.js";
import { ErrorCode } from "../core/errors.js";
import { requireCaller, SessionTokens } from "./caller.js";
import { makeRateLimiter } from "./rate-limit.js";

const InstructionBody = z.object({
  instruction: z.string().trim().min(1).max(2000),
  confirm: z.boolean().optional()
});

const ChatBody = z.object({
  message: z.string().trim().min(1).max(2000),
  history: z
    .array(z.object({ role: z.enum(["user", "assistant"]), content: z.string().max(4000) }))
    .max(50)
    .optional()
});

const ERROR_STATUS: Record<ErrorCode, number> = {
  unauthorized: 403,
  store_unavailable: 503,
  upstream_failed: 503,
  upstream_timeout: 504,
  duplicate_service_tag: 409
};

export function httpStatusOf(out: InterpreterResponse): number {
  if (out.status === "ok") return 200;
  if (out.status === "incomplete") return out.data?.reason === "confirmation_required" ? 409 : 422;
  return out.data?.code ? ERROR_STATUS[out.data.code] : 500;
}

export function makeAiRoutes(args: {
  interpreter: Interpreter;
  sessionTokens: SessionTokens;
  rateLimit?: { windowMs: number; max: number };
}) {
  const r = Router();

  if (args.rateLimit) r.use(makeRateLimiter(args.rateLimit));

  function authed(req: Request, res: Response) {
    const auth = requireCaller(req.header("authorization"), args.sessionTokens);
    if (!auth.ok) {
      res.status(auth.status).json({ status: "error", message: "Please sign in to use the assistant.", data: { code: auth.error } });
      return undefined;
    }
    return auth.caller;
  }

  // POST /api/ai/natural-crud  { instruction, confirm? }
  r.post("/natural-crud", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = authed(req, res);
      if (!caller) return;
      const body = InstructionBody.safeParse(req.body);
      if (!body.success) {
        return res.status(400).json({ status: "error", message: "Please type an instruction.", data: { code: "bad_request" } });
      }
      const out = await args.interpreter.handleInstruction(body.data.instruction, caller, { confirm: body.data.confirm });
      res.status(httpStatusOf(out)).json(out);
    } catch (err) {
      next(err);
    }
  });

  // POST /api/ai/chat  { message, history? }
  r.post("/chat", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = authed(req, res);
      if (!caller) return;
      const body = ChatBody.safeParse(req.body);
      if (!body.success) {
        return res.status(400).json({ status: "error", message: "Please type a message.", data: { code: "bad_request" } });
      }
      const out = await args.interpreter.answerChat(body.data.message, caller, body.data.history ?? []);
      res.status(httpStatusOf(out)).json(out);
    } catch (err) {
      next(err);
    }
  });

  return r;
}

export function makeRoutes(args: Parameters<typeof makeAiRoutes>[0]) {
  const r = Router();

  r.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  r.use("/ai", makeAiRoutes(args));
  return r;
}

/** Last-resort handler: logs the failure and answers with prose, never a stack. */
export function makeErrorHandler(log: Logger): ErrorRequestHandler {
  return (err, _req, res, _next) => {
    // body-parser rejects malformed JSON with a 4xx status
    const status: unknown = err?.status;
    if (typeof status === "number" && status >= 400 && status < 500) {
      return res.status(status).json({ status: "error", message: "The request could not be read.", data: { code: "bad_request" } });
    }
    log.error({ err }, "request failed");
    res.status(500).json({ status: "error", message: "Something went wrong on our side. Please try again.", data: { code: "internal" } });
  };
}
