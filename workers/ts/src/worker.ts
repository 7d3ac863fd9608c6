import { ZodError } from "zod";
import { buildCatalogue, searchPanels } from "./catalogue.js";
import { diffTexts } from "./diff.js";
import { errorMessage } from "./errors.js";
import { parsePanel, slugFromPath } from "./panel.js";
import {
  CatalogueParamsSchema,
  DiffParamsSchema,
  ParseParamsSchema,
  ReportParamsSchema,
  RpcRequestSchema,
  SearchParamsSchema,
  SummarizeParamsSchema,
  ValidateParamsSchema,
  type ValidateResult,
} from "./protocol.js";
import { renderReport, summarizeChange } from "./report.js";
import { hasErrors, validatePanels } from "./validate.js";

type RpcId = number | string | null;

export type RpcResponse =
  | { jsonrpc: "2.0"; id: RpcId; result: unknown }
  | { jsonrpc: "2.0"; id: RpcId; error: { code: number; message: string } };

class MethodNotFound extends Error {}

function dispatch(method: string, params: unknown): unknown {
  switch (method) {
    case "parse": {
      const p = ParseParamsSchema.parse(params);
      const snapshot = parsePanel(p.content, slugFromPath(p.path));
      return { ...snapshot, metadata: [...snapshot.metadata] };
    }
    case "validate": {
      const p = ValidateParamsSchema.parse(params);
      const results = validatePanels(p.files);
      const result: ValidateResult = { results, ok: !hasErrors(results) };
      return result;
    }
    case "diff": {
      const p = DiffParamsSchema.parse(params);
      return diffTexts(p.base, p.head);
    }
    case "summarize": {
      const p = SummarizeParamsSchema.parse(params);
      const diff = diffTexts(p.base, p.head, p.slug);
      return { ...diff, body: summarizeChange(p.slug, diff) };
    }
    case "report": {
      const p = ReportParamsSchema.parse(params);
      return { markdown: renderReport(new Map(Object.entries(p.diffs))) };
    }
    case "catalogue":
      return buildCatalogue(CatalogueParamsSchema.parse(params).files);
    case "search": {
      const p = SearchParamsSchema.parse(params);
      return searchPanels(p.files, p.query);
    }
    default:
      throw new MethodNotFound(method);
  }
}

/** Answers one line of line-delimited JSON-RPC 2.0. */
export function handleLine(line: string): RpcResponse {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    return { jsonrpc: "2.0", id: null, error: { code: -32700, message: `Parse error: ${errorMessage(err)}` } };
  }

  const req = RpcRequestSchema.safeParse(raw);
  if (!req.success) {
    return { jsonrpc: "2.0", id: null, error: { code: -32600, message: "Invalid Request" } };
  }

  const { id, method, params } = req.data;
  try {
    return { jsonrpc: "2.0", id, result: dispatch(method, params) };
  } catch (err) {
    if (err instanceof MethodNotFound) {
      return { jsonrpc: "2.0", id, error: { code: -32601, message: "Method not found" } };
    }
    if (err instanceof ZodError) {
      const detail = err.issues.map((i) => `${i.path.join(".") || "params"}: ${i.message}`).join("; ");
      return { jsonrpc: "2.0", id, error: { code: -32602, message: `Invalid params: ${detail}` } };
    }
    return { jsonrpc: "2.0", id, error: { code: -32000, message: errorMessage(err) } };
  }
}
