import type {
  AmazonOrderEntry,
  ConsortialShipmentEntry,
  GenericOrderEntry,
  RawOrderEntry
} from "./order-schema";
import type { OrderLine, OrderLineDetails, VendorFormat } from "./order-types";

export type ConversionContext = {
  lineNumber: number;
  lineIndex: number;
  amazonVendorCode: string;
};

export type Conversion = { ok: true; line: OrderLine } | { ok: false; reason: string };

type Parsed<T> = { ok: true; value: T } | { ok: false; reason: string };

const DEFAULT_CURRENCY = "USD";
const MIN_PUBLICATION_YEAR = 1400;
const MAX_PUBLICATION_YEAR = 2030;

/**
 * Prices are whole cents: a leading currency symbol and thousands
 * separators are accepted, a third decimal place is not.
 */
export function parsePrice(value: string | number): Parsed<{ price: number; raw: string }> {
  const raw = typeof value === "number" ? String(value) : value.trim();
  const shown = typeof value === "number" ? raw : `"${raw}"`;
  const cleaned = raw.replace(/^[$€£]\s*/, "").replace(/,(?=\d{3}(\D|$))/g, "");
  if (!/^\d+(\.\d+)?$/.test(cleaned) || Number(cleaned) <= 0) {
    return { ok: false, reason: `price must be a positive number (got ${shown})` };
  }
  if (/\.\d{3,}$/.test(cleaned)) {
    return { ok: false, reason: `price must have at most two decimal places (got ${shown})` };
  }
  return { ok: true, value: { price: Number(cleaned), raw } };
}

export function parseQuantity(value: string | number): Parsed<number> {
  const quantity = typeof value === "number" ? value : /^\d+$/.test(value.trim()) ? Number(value.trim()) : NaN;
  if (Number.isInteger(quantity) && quantity > 0) {
    return { ok: true, value: quantity };
  }
  return { ok: false, reason: `quantity must be a positive whole number (got ${JSON.stringify(value)})` };
}

export function normalizeIsbn(value: string): Parsed<string> {
  const cleaned = value.replace(/[^0-9A-Za-z]/g, "");
  if (cleaned.length !== 10 && cleaned.length !== 13) {
    return { ok: false, reason: `ISBN should be 10 or 13 digits (got "${value}")` };
  }
  return { ok: true, value: cleaned.toUpperCase() };
}

export function parsePublicationYear(value: string | number): Parsed<string> {
  const year = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isInteger(year)) {
    return { ok: false, reason: `publication year must be a whole year (got ${JSON.stringify(value)})` };
  }
  if (year < MIN_PUBLICATION_YEAR || year > MAX_PUBLICATION_YEAR) {
    return {
      ok: false,
      reason: `publication year should be between ${MIN_PUBLICATION_YEAR} and ${MAX_PUBLICATION_YEAR} (got ${year})`
    };
  }
  return { ok: true, value: String(year) };
}

type CommonFields = {
  title: string;
  author?: string;
  vendorId: string;
  vendorOrderRef: string;
  amount: string | number;
  count: string | number;
  currency?: string;
  extras: Omit<OrderLineDetails, "isbn" | "publicationYear" | "receivingCategories" | "catalogId"> & {
    isbn?: string;
    publicationYear?: string | number;
    receivingCategories?: OrderLineDetails["receivingCategories"];
    oclcNumber?: string;
  };
};

function buildLine(format: VendorFormat, fields: CommonFields, context: ConversionContext): Conversion {
  const price = parsePrice(fields.amount);
  if (!price.ok) {
    return price;
  }
  const quantity = parseQuantity(fields.count);
  if (!quantity.ok) {
    return quantity;
  }

  const { isbn, publicationYear, receivingCategories, oclcNumber, ...rest } = fields.extras;
  const details: OrderLineDetails = {
    ...rest,
    receivingCategories: receivingCategories ?? []
  };
  if (isbn) {
    const normalized = normalizeIsbn(isbn);
    if (!normalized.ok) {
      return normalized;
    }
    details.isbn = normalized.value;
  }
  if (publicationYear !== undefined) {
    const year = parsePublicationYear(publicationYear);
    if (!year.ok) {
      return year;
    }
    details.publicationYear = year.value;
  }
  if (oclcNumber) {
    details.catalogId = oclcNumber;
  }

  const line: OrderLine = Object.freeze({
    format,
    vendorId: fields.vendorId,
    title: fields.title,
    author: fields.author,
    rawPrice: price.value.raw,
    price: price.value.price,
    currency: fields.currency ?? DEFAULT_CURRENCY,
    vendorOrderRef: fields.vendorOrderRef,
    quantity: quantity.value,
    lineNumber: context.lineNumber,
    lineIndex: context.lineIndex,
    details: Object.freeze(details)
  });
  return { ok: true, line };
}

function receivingExtras(entry: RawOrderEntry): CommonFields["extras"] {
  return {
    template: entry.template,
    reportingCode: entry.reportingCode,
    receivingCategories: entry.receivingCategories,
    note: entry.note,
    reserveNote: entry.reserveNote,
    interestedUser: entry.interestedUser,
    oclcNumber: entry.oclcNumber,
    isbn: entry.isbn,
    publisher: entry.publisher,
    publicationYear: entry.publicationYear
  };
}

/**
 * Amazon order export row. Amazon only gives a product name, which doubles
 * as the title unless the export was annotated with one.
 */
export function fromAmazonOrder(entry: AmazonOrderEntry, context: ConversionContext): Conversion {
  const title = entry.title ?? entry.productName;
  if (!title) {
    return { ok: false, reason: "title: either title or productName is required" };
  }
  return buildLine(
    "amazon",
    {
      title,
      author: entry.author,
      vendorId: entry.vendorCode ?? context.amazonVendorCode,
      vendorOrderRef: entry.orderId,
      amount: entry.unitPrice,
      count: entry.quantity,
      currency: entry.currency,
      extras: { ...receivingExtras(entry), asin: entry.asin }
    },
    context
  );
}

export function fromGenericOrder(entry: GenericOrderEntry, context: ConversionContext): Conversion {
  return buildLine(
    "generic",
    {
      title: entry.title,
      author: entry.author,
      vendorId: entry.vendorCode,
      vendorOrderRef: entry.vendorReference,
      amount: entry.price,
      count: entry.quantity,
      currency: entry.currency,
      extras: { ...receivingExtras(entry), vendorAccount: entry.vendorAccount }
    },
    context
  );
}

export function fromConsortialShipment(entry: ConsortialShipmentEntry, context: ConversionContext): Conversion {
  return buildLine(
    "consortial",
    {
      title: entry.title,
      author: entry.author,
      vendorId: entry.lenderCode,
      vendorOrderRef: entry.shipmentId,
      amount: entry.cost,
      count: entry.copies,
      currency: entry.currency,
      extras: receivingExtras(entry)
    },
    context
  );
}

export function toOrderLine(entry: RawOrderEntry, context: ConversionContext): Conversion {
  switch (entry.format) {
    case "amazon":
      return fromAmazonOrder(entry, context);
    case "generic":
      return fromGenericOrder(entry, context);
    case "consortial":
      return fromConsortialShipment(entry, context);
  }
}
