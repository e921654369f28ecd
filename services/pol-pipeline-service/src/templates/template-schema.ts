import { z } from "zod";
import { FIELD_PATH_PATTERN } from "./field-path";

const defaultValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(z.string())]);

export const templateDocumentSchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, "template names are lower-case words joined by dashes"),
  version: z.union([z.number().int().positive(), z.string().min(1)]).transform(String),
  description: z.string().default(""),
  materialType: z.string().min(1),
  catalogIdField: z
    .string()
    .regex(FIELD_PATH_PATTERN, "catalogIdField must be a field path")
    .default("resource_metadata.system_control_number"),
  receiptLeadDays: z.number().int().min(0).default(30),
  defaults: z.record(defaultValueSchema).superRefine((defaults, ctx) => {
    for (const fieldPath of Object.keys(defaults)) {
      if (!FIELD_PATH_PATTERN.test(fieldPath)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${fieldPath}" is not a valid field path` });
      }
    }
  })
});

export type TemplateDefaultValue = z.infer<typeof defaultValueSchema>;
export type POLTemplate = z.infer<typeof templateDocumentSchema>;

export const reportingCodesSchema = z.array(z.string().min(1));

/**
 * Fields the acquisitions API rejects a POL without.
 */
export const REQUIRED_POL_FIELDS = [
  "owner.value",
  "type.value",
  "acquisition_method.value",
  "material_type.value",
  "vendor.value",
  "vendor_account",
  "resource_metadata.title",
  "price.sum",
  "price.currency.value",
  "location.0.library.value",
  "location.0.shelving_location",
  "location.0.quantity",
  "reporting_code"
] as const;

export const PURCHASE_FUND_FIELD = "fund_distribution.0.fund_code.value";
