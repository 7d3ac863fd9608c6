import { z } from "zod";
import { isValidSlug, slugFromPath } from "./panel.js";

export type PanelFile = { path: string; content: string };

export type PanelSnapshot = {
  slug: string;
  metadata: ReadonlyMap<string, string>;
  genes: readonly string[];
  digest: string;
};

export type IssueKind = "FormatError" | "OrderError" | "DuplicateError" | "DuplicateWarning";

export type ValidationIssue = {
  kind: IssueKind;
  message: string;
  line?: number;
  firstLine?: number;
  token?: string;
};

export type ValidationResult = { errors: ValidationIssue[]; warnings: ValidationIssue[] };

export type DiffResult = { added: string[]; removed: string[] };

export type PanelSummary = {
  slug: string;
  title: string;
  geneCount: number;
  /** Metadata entries in file order. */
  metadata: Array<[string, string]>;
};

export type SearchResult = { geneMatches: PanelSummary[]; nameMatches: PanelSummary[] };

const PanelFileSchema = z.object({ path: z.string().min(1), content: z.string() });

const SlugSchema = z.string().refine(isValidSlug, "slug may only contain letters, digits, '-' and '_'");

/** A panel file whose name yields a usable slug. */
const NamedPanelFileSchema = PanelFileSchema.extend({
  path: PanelFileSchema.shape.path.refine(
    (p) => isValidSlug(slugFromPath(p)),
    "file name may only contain letters, digits, '-' and '_'",
  ),
});

export const ParseParamsSchema = NamedPanelFileSchema;

export const ValidateParamsSchema = z.object({ files: z.array(PanelFileSchema) });

export type ValidateResult = {
  results: Array<{ path: string } & ValidationResult>;
  ok: boolean;
};

export const DiffParamsSchema = z.object({
  base: z.string().nullable(),
  head: z.string().nullable(),
});

export const ReportParamsSchema = z.object({
  diffs: z.record(z.object({ added: z.array(z.string()), removed: z.array(z.string()) })),
});

export const CatalogueParamsSchema = z.object({ files: z.array(NamedPanelFileSchema) });

export const SearchParamsSchema = z.object({
  files: z.array(NamedPanelFileSchema),
  query: z.string(),
});

export const SummarizeParamsSchema = z.object({
  slug: SlugSchema,
  base: z.string().nullable(),
  head: z.string().nullable(),
});

export const RpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.number(), z.string()]),
  method: z.string(),
  params: z.unknown(),
});
