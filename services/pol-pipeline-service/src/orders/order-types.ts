import type { ReceivingCategory } from "./order-schema";

export type VendorFormat = "amazon" | "generic" | "consortial";

export type InterestedUser = {
  primaryId: string;
  notify: boolean;
  hold: boolean;
};

export type OrderLineDetails = {
  isbn?: string;
  asin?: string;
  publisher?: string;
  publicationYear?: string;
  catalogId?: string;
  vendorAccount?: string;
  template?: string;
  reportingCode?: string;
  receivingCategories: ReceivingCategory[];
  note?: string;
  reserveNote?: string;
  interestedUser?: InterestedUser;
};

export type OrderLine = Readonly<{
  format: VendorFormat;
  vendorId: string;
  title: string;
  author?: string;
  rawPrice: string;
  price: number;
  currency: string;
  vendorOrderRef: string;
  quantity: number;
  lineNumber: number;
  lineIndex: number;
  details: Readonly<OrderLineDetails>;
}>;

export type ReadError = {
  lineNumber: number;
  reason: string;
  format?: string;
  vendorOrderRef?: string;
};

export type OrderBatch = {
  batchId: string;
  defaultTemplate?: string;
  entries: unknown[];
};

export type BatchReadResult = {
  batchId: string;
  lines: OrderLine[];
  readErrors: ReadError[];
};

export function orderLineRef(line: Pick<OrderLine, "vendorOrderRef" | "lineIndex">): string {
  return `${line.vendorOrderRef}#${line.lineIndex}`;
}
