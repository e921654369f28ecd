import { z } from "zod";

export const receivingCategorySchema = z.enum(["None", "Note", "Interested User", "Reserve", "Display", "Replacement"]);

export type ReceivingCategory = z.infer<typeof receivingCategorySchema>;

const amountSchema = z.union([z.string(), z.number()]);
const optionalText = z.string().trim().min(1).optional();
const currencySchema = z
  .string()
  .regex(/^[A-Za-z]{3}$/, "currency must be a 3-letter code")
  .transform((value) => value.toUpperCase())
  .optional();

const receivingFields = {
  template: optionalText,
  reportingCode: optionalText,
  receivingCategories: z
    .array(receivingCategorySchema)
    .min(1)
    .refine((categories) => !categories.includes("None") || categories.length === 1, {
      message: "Cannot select 'None' with other categories"
    })
    .optional(),
  note: optionalText,
  reserveNote: optionalText,
  interestedUser: z
    .object({
      primaryId: z.string().regex(/^\d{9}$/, "User ID must be exactly 9 digits"),
      notify: z.boolean().default(false),
      hold: z.boolean().default(false)
    })
    .optional(),
  oclcNumber: optionalText,
  isbn: optionalText,
  publisher: optionalText,
  publicationYear: amountSchema.optional()
};

export const amazonOrderSchema = z.object({
  format: z.literal("amazon"),
  orderId: z.string().trim().min(1),
  vendorCode: optionalText,
  asin: optionalText,
  productName: optionalText,
  title: optionalText,
  author: optionalText,
  unitPrice: amountSchema,
  quantity: amountSchema.default(1),
  currency: currencySchema,
  ...receivingFields
});

export const genericOrderSchema = z.object({
  format: z.literal("generic"),
  vendorCode: z.string().trim().min(1),
  vendorAccount: optionalText,
  vendorReference: z.string().trim().min(1),
  title: z.string().trim().min(1),
  author: optionalText,
  price: amountSchema,
  quantity: amountSchema.default(1),
  currency: currencySchema,
  ...receivingFields
});

export const consortialShipmentSchema = z.object({
  format: z.literal("consortial"),
  shipmentId: z.string().trim().min(1),
  lenderCode: z.string().trim().min(1),
  title: z.string().trim().min(1),
  author: optionalText,
  cost: amountSchema,
  copies: amountSchema.default(1),
  currency: currencySchema,
  ...receivingFields
});

type ReceivingDetails = {
  receivingCategories?: ReceivingCategory[];
  note?: string;
  reserveNote?: string;
  interestedUser?: unknown;
};

const CONDITIONAL_DETAILS: Array<[field: "interestedUser" | "note" | "reserveNote", category: ReceivingCategory]> = [
  ["interestedUser", "Interested User"],
  ["note", "Note"],
  ["reserveNote", "Reserve"]
];

/**
 * Receiving details exist only under their category, and "Interested User"
 * needs the user.
 */
function checkReceivingDetails(entry: ReceivingDetails, ctx: z.RefinementCtx): void {
  const categories = entry.receivingCategories ?? [];
  for (const [field, category] of CONDITIONAL_DETAILS) {
    if (entry[field] !== undefined && !categories.includes(category)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [field],
        message: `only allowed when '${category}' is a receiving category`
      });
    }
  }
  if (categories.includes("Interested User") && entry.interestedUser === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["interestedUser"],
      message: "required when 'Interested User' is a receiving category"
    });
  }
}

export const rawOrderEntrySchema = z
  .discriminatedUnion("format", [amazonOrderSchema, genericOrderSchema, consortialShipmentSchema])
  .superRefine(checkReceivingDetails);

export type AmazonOrderEntry = z.infer<typeof amazonOrderSchema>;
export type GenericOrderEntry = z.infer<typeof genericOrderSchema>;
export type ConsortialShipmentEntry = z.infer<typeof consortialShipmentSchema>;
export type RawOrderEntry = z.infer<typeof rawOrderEntrySchema>;

export const orderBatchFileSchema = z.object({
  batchId: z.string().min(1).optional(),
  defaultTemplate: z.string().min(1).optional(),
  entries: z.array(z.unknown())
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "entry"}: ${issue.message}`)
    .join("; ");
}
