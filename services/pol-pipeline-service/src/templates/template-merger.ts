import { SchemaValidationError } from "../errors";
import type { ResolvedIdentifier } from "../catalog/identifier-resolver";
import { hashString, stableStringify } from "../lib/stable-json";
import type { OrderLine } from "../orders/order-types";
import { orderLineRef } from "../orders/order-types";
import { getPath, isBlank, setPath } from "./field-path";
import type { POLTemplate, TemplateDefaultValue } from "./template-schema";
import { PURCHASE_FUND_FIELD, REQUIRED_POL_FIELDS } from "./template-schema";
import type { TemplateStore } from "./template-store";

export type PolKey = {
  vendorOrderRef: string;
  lineIndex: number;
};

export type PolPayload = Record<string, unknown>;

export type POLRecord = {
  key: PolKey;
  keyId: string;
  templateName: string;
  templateVersion: string;
  lineNumber: number;
  payload: PolPayload;
  payloadHash: string;
};

export type MergeContext = {
  /** Reference date for expected_receipt_date; the run start time. */
  asOf: Date;
};

export function buildPolKeyId(key: PolKey): string {
  return orderLineRef(key);
}

/** Fields derived from the run rather than the order line; not hashed. */
const RUN_DEPENDENT_FIELDS = ["expected_receipt_date"];

function contentHash(payload: PolPayload): string {
  const content: PolPayload = { ...payload };
  for (const field of RUN_DEPENDENT_FIELDS) {
    delete content[field];
  }
  return hashString(stableStringify(content));
}

function cloneDefault(value: TemplateDefaultValue): TemplateDefaultValue {
  return Array.isArray(value) ? [...value] : value;
}

function addDays(date: Date, days: number): string {
  const shifted = new Date(date.getTime() + days * 24 * 60 * 60 * 1000);
  return shifted.toISOString().slice(0, 10);
}

function nonBlankString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value : undefined;
}

function receivingNote(line: OrderLine): string {
  const categories = line.details.receivingCategories.filter((category) => category !== "None");
  return categories.join(" | ");
}

function applyOrderLine(payload: PolPayload, template: POLTemplate, line: OrderLine, context: MergeContext): void {
  const price = line.price.toFixed(2);
  const money = () => ({ sum: price, currency: { value: line.currency } });

  setPath(payload, "vendor.value", line.vendorId);
  setPath(
    payload,
    "vendor_account",
    line.details.vendorAccount ?? nonBlankString(template.defaults.vendor_account) ?? line.vendorId
  );

  setPath(payload, "resource_metadata.title", line.title);
  if (line.author) {
    setPath(payload, "resource_metadata.author", line.author);
  }
  if (line.details.isbn) {
    setPath(payload, "resource_metadata.isbn", line.details.isbn);
  }
  if (line.details.publisher) {
    setPath(payload, "resource_metadata.publisher", line.details.publisher);
  }
  if (line.details.publicationYear) {
    setPath(payload, "resource_metadata.publication_year", line.details.publicationYear);
  }

  payload.price = money();
  const funds = payload.fund_distribution;
  if (Array.isArray(funds) && funds.length > 0) {
    setPath(payload, "fund_distribution.0.amount", money());
  }
  const locations = payload.location;
  if (Array.isArray(locations) && locations.length > 0) {
    setPath(payload, "location.0.quantity", line.quantity);
  }
  payload.vendor_reference_number = line.vendorOrderRef;

  payload.receiving_note = receivingNote(line);

  const notes: Array<{ note_text: string }> = [];
  if (line.details.note) {
    notes.push({ note_text: line.details.note });
  }
  if (line.details.reserveNote) {
    notes.push({ note_text: `Reserve Note: ${line.details.reserveNote}` });
  }
  if (notes.length > 0) {
    payload.note = notes;
  }

  const user = line.details.interestedUser;
  if (user) {
    payload.interested_user = [
      {
        primary_id: user.primaryId,
        notify_receiving_activation: user.notify,
        hold_item: user.hold,
        notify_renewal: false,
        notify_cancel: false
      }
    ];
  } else {
    delete payload.interested_user;
  }

  payload.expected_receipt_date = addDays(context.asOf, template.receiptLeadDays);
  if (line.details.reportingCode) {
    payload.reporting_code = line.details.reportingCode;
  }
}

function validate(payload: PolPayload, reportingCodes: ReadonlySet<string>): string[] {
  const issues: string[] = REQUIRED_POL_FIELDS.filter((fieldPath) => isBlank(getPath(payload, fieldPath))).map(
    (fieldPath) => `${fieldPath} is required`
  );

  if (getPath(payload, "acquisition_method.value") === "PURCHASE" && isBlank(getPath(payload, PURCHASE_FUND_FIELD))) {
    issues.push(`${PURCHASE_FUND_FIELD} is required for purchases`);
  }

  const quantity = getPath(payload, "location.0.quantity");
  if (quantity !== undefined && !(typeof quantity === "number" && Number.isInteger(quantity) && quantity > 0)) {
    issues.push("location.0.quantity must be a positive whole number");
  }

  const reportingCode = payload.reporting_code;
  if (reportingCodes.size > 0 && typeof reportingCode === "string" && reportingCode.length > 0) {
    if (!reportingCodes.has(reportingCode)) {
      issues.push(`reporting_code "${reportingCode}" is not a known reporting code`);
    }
  }

  return issues;
}

/**
 * Builds the POL body: template defaults, then order-line fields, then the
 * resolved catalog identifier. Output depends only on the inputs.
 */
export function mergePolRecord(
  store: TemplateStore,
  templateName: string,
  line: OrderLine,
  resolved: ResolvedIdentifier,
  context: MergeContext
): POLRecord {
  const template = store.get(templateName);
  const payload: PolPayload = {};
  for (const [fieldPath, value] of Object.entries(template.defaults)) {
    setPath(payload, fieldPath, cloneDefault(value));
  }

  applyOrderLine(payload, template, line, context);

  if (resolved.catalogId) {
    setPath(payload, template.catalogIdField, [resolved.catalogId]);
  }

  const issues = validate(payload, store.reportingCodes);
  if (issues.length > 0) {
    throw new SchemaValidationError(issues);
  }

  const key: PolKey = { vendorOrderRef: line.vendorOrderRef, lineIndex: line.lineIndex };
  return {
    key,
    keyId: buildPolKeyId(key),
    templateName: template.name,
    templateVersion: template.version,
    lineNumber: line.lineNumber,
    payload,
    payloadHash: contentHash(payload)
  };
}
