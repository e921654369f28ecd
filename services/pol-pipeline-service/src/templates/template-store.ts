import { existsSync, readdirSync, readFileSync } from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import { parse as parseYaml } from "yaml";
import { TemplateNotFoundError, TemplateStoreError } from "../errors";
import { logger as rootLogger } from "../logger";
import { formatIssues } from "../orders/order-schema";
import type { POLTemplate } from "./template-schema";
import { reportingCodesSchema, templateDocumentSchema } from "./template-schema";

export type TemplateStore = {
  get: (name: string) => POLTemplate;
  names: () => string[];
  reportingCodes: ReadonlySet<string>;
  info: TemplateStoreInfo;
};

export type TemplateStoreInfo = {
  root: string;
  loadedAt: string;
  skipped: Array<{ file: string; reason: string }>;
};

export type TemplateLoader = {
  load: () => TemplateStore;
};

const REPORTING_CODES_FILE = "reporting-codes.json";
const TEMPLATE_EXTENSIONS = [".yaml", ".yml"];

export function resolveTemplateRoot(override?: string): string {
  if (override) {
    return path.resolve(override);
  }
  const roots = [
    process.cwd(),
    path.resolve(process.cwd(), ".."),
    path.resolve(process.cwd(), "..", ".."),
    path.resolve(process.cwd(), "..", "..", "..")
  ];

  for (const candidate of roots) {
    const templateDir = path.resolve(candidate, "templates");
    if (existsSync(templateDir)) {
      return templateDir;
    }
  }

  return path.resolve(process.cwd(), "templates");
}

export function createTemplateStore(
  templates: POLTemplate[],
  reportingCodes: string[] = [],
  info?: Partial<TemplateStoreInfo>
): TemplateStore {
  const byName = new Map<string, POLTemplate>();
  for (const template of templates) {
    if (byName.has(template.name)) {
      throw new TemplateStoreError(`Template "${template.name}" is defined more than once`);
    }
    byName.set(template.name, template);
  }
  const names = () => [...byName.keys()].sort((a, b) => a.localeCompare(b));

  return {
    get: (name) => {
      const template = byName.get(name);
      if (!template) {
        throw new TemplateNotFoundError(name, names());
      }
      return template;
    },
    names,
    reportingCodes: new Set(reportingCodes),
    info: {
      root: info?.root ?? "memory",
      loadedAt: info?.loadedAt ?? new Date().toISOString(),
      skipped: info?.skipped ?? []
    }
  };
}

export function parseTemplate(raw: string): POLTemplate {
  return templateDocumentSchema.parse(parseYaml(raw));
}

function loadReportingCodes(root: string): string[] {
  const codesPath = path.resolve(root, REPORTING_CODES_FILE);
  if (!existsSync(codesPath)) {
    return [];
  }
  const parsed = reportingCodesSchema.safeParse(JSON.parse(readFileSync(codesPath, "utf-8")));
  if (!parsed.success) {
    throw new TemplateStoreError(`${codesPath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function readTemplateFile(filePath: string): { ok: true; template: POLTemplate } | { ok: false; reason: string } {
  let document: unknown;
  try {
    document = parseYaml(readFileSync(filePath, "utf-8"));
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
  const parsed = templateDocumentSchema.safeParse(document);
  if (!parsed.success) {
    return { ok: false, reason: formatIssues(parsed.error) };
  }
  return { ok: true, template: parsed.data };
}

function loadTemplatesFromDisk(root: string, log: Logger): TemplateStore {
  if (!existsSync(root)) {
    throw new TemplateStoreError(`Templates directory not found: ${root}`);
  }
  const files = readdirSync(root)
    .filter((file) => TEMPLATE_EXTENSIONS.includes(path.extname(file)))
    .sort((a, b) => a.localeCompare(b));

  const templates: POLTemplate[] = [];
  const skipped: TemplateStoreInfo["skipped"] = [];
  for (const file of files) {
    const result = readTemplateFile(path.resolve(root, file));
    if (!result.ok) {
      skipped.push({ file, reason: result.reason });
      log.warn({ file, reason: result.reason }, "Skipping invalid POL template");
      continue;
    }
    templates.push(result.template);
  }

  if (templates.length === 0) {
    throw new TemplateStoreError(`No usable templates in ${root}`);
  }

  const store = createTemplateStore(templates, loadReportingCodes(root), {
    root,
    loadedAt: new Date().toISOString(),
    skipped
  });
  log.info({ root, templates: store.names() }, "POL templates loaded");
  return store;
}

export function createTemplateLoader(options?: { root?: string; logger?: Logger }): TemplateLoader {
  const root = resolveTemplateRoot(options?.root);
  const log = options?.logger ?? rootLogger;
  return {
    load: () => loadTemplatesFromDisk(root, log)
  };
}
