import { describe, expect, test } from "vitest";
import type { ResolvedIdentifier } from "../src/catalog/identifier-resolver";
import { SchemaValidationError, TemplateNotFoundError } from "../src/errors";
import { stableStringify } from "../src/lib/stable-json";
import { getPath } from "../src/templates/field-path";
import { mergePolRecord } from "../src/templates/template-merger";
import { createTemplateLoader, createTemplateStore, parseTemplate } from "../src/templates/template-store";
import { makeLine, TEMPLATES_DIR } from "./fakes";

const store = createTemplateLoader({ root: TEMPLATES_DIR }).load();
const asOf = new Date("2026-10-01T12:00:00Z");

const matched: ResolvedIdentifier = {
  sourceOrderLineRef: "INV-1#1",
  catalogId: "ocm-dune",
  confidence: 0.95,
  matchMethod: "title_author_match",
  matchedTitle: "Dune"
};

const unresolved: ResolvedIdentifier = {
  sourceOrderLineRef: "INV-1#1",
  catalogId: null,
  confidence: 0.4,
  matchMethod: "below_threshold",
  matchedTitle: "Dune Messiah"
};

describe("mergePolRecord", () => {
  test("overlays the order line and catalog id on the template defaults", () => {
    const record = mergePolRecord(store, "book", makeLine(), matched, { asOf });

    expect(record.keyId).toBe("INV-1#1");
    expect(record.key).toEqual({ vendorOrderRef: "INV-1", lineIndex: 1 });
    expect(record.templateName).toBe("book");
    expect(record.templateVersion).toBe("3");
    expect(record.payloadHash).toMatch(/^[0-9a-f]{64}$/);
    expect(record.payload).toEqual({
      owner: { value: "MAIN" },
      type: { value: "PRINTED_BOOK_OT" },
      acquisition_method: { value: "PURCHASE" },
      material_type: { value: "BOOK" },
      vendor: { value: "hacky-m" },
      vendor_account: "hacky-m",
      fund_distribution: [
        {
          fund_code: { value: "BOOKS-GEN" },
          percent: 100,
          amount: { sum: "24.99", currency: { value: "USD" } }
        }
      ],
      location: [{ library: { value: "MAIN" }, shelving_location: "STACKS", quantity: 1 }],
      reporting_code: "General",
      rush: false,
      cancellation_restriction: false,
      resource_metadata: {
        title: "Dune",
        author: "Frank Herbert",
        system_control_number: ["ocm-dune"]
      },
      price: { sum: "24.99", currency: { value: "USD" } },
      vendor_reference_number: "INV-1",
      receiving_note: "",
      expected_receipt_date: "2026-10-31"
    });
  });

  test("merging twice yields byte-identical records", () => {
    const first = mergePolRecord(store, "book", makeLine(), matched, { asOf });
    const second = mergePolRecord(store, "book", makeLine(), matched, { asOf });
    expect(stableStringify(second)).toBe(stableStringify(first));
    expect(second.payloadHash).toBe(first.payloadHash);
  });

  test("the payload hash ignores the run date", () => {
    const october = mergePolRecord(store, "book", makeLine(), matched, { asOf });
    const november = mergePolRecord(store, "book", makeLine(), matched, { asOf: new Date("2026-11-01T12:00:00Z") });
    expect(november.payload.expected_receipt_date).toBe("2026-12-01");
    expect(november.payloadHash).toBe(october.payloadHash);

    const repriced = mergePolRecord(store, "book", makeLine({ price: 19.99 }), matched, { asOf });
    expect(repriced.payloadHash).not.toBe(october.payloadHash);
  });

  test("an unresolved identifier still merges without a catalog id", () => {
    const record = mergePolRecord(store, "book", makeLine(), unresolved, { asOf });
    expect(getPath(record.payload, "resource_metadata.system_control_number")).toBeUndefined();
    expect(getPath(record.payload, "resource_metadata.title")).toBe("Dune");
  });

  test("receiving details become notes and interested users", () => {
    const line = makeLine({
      quantity: 2,
      details: {
        receivingCategories: ["Note", "Interested User", "Reserve"],
        note: "Rush please",
        reserveNote: "HIST 101",
        interestedUser: { primaryId: "000000001", notify: true, hold: false },
        reportingCode: "History",
        vendorAccount: "hacky-m-card"
      }
    });
    const { payload } = mergePolRecord(store, "book", line, matched, { asOf });

    expect(payload.receiving_note).toBe("Note | Interested User | Reserve");
    expect(payload.note).toEqual([{ note_text: "Rush please" }, { note_text: "Reserve Note: HIST 101" }]);
    expect(payload.interested_user).toEqual([
      {
        primary_id: "000000001",
        notify_receiving_activation: true,
        hold_item: false,
        notify_renewal: false,
        notify_cancel: false
      }
    ]);
    expect(payload.reporting_code).toBe("History");
    expect(payload.vendor_account).toBe("hacky-m-card");
    expect(getPath(payload, "location.0.quantity")).toBe(2);
  });

  test("uses the template's receipt lead time", () => {
    const { payload } = mergePolRecord(store, "film", makeLine(), matched, { asOf });
    expect(payload.expected_receipt_date).toBe("2026-11-15");
    expect(getPath(payload, "fund_distribution.0.fund_code.value")).toBe("MEDIA");
  });

  test("gift template needs no fund", () => {
    const { payload } = mergePolRecord(store, "gift", makeLine(), matched, { asOf });
    expect(payload.fund_distribution).toBeUndefined();
    expect(payload.price).toEqual({ sum: "24.99", currency: { value: "USD" } });
    expect(payload.reporting_code).toBe("General");
  });

  test("unknown reporting codes fail validation", () => {
    const line = makeLine({ details: { reportingCode: "Astrology" } });
    expect(() => mergePolRecord(store, "book", line, matched, { asOf })).toThrow(
      new SchemaValidationError(['reporting_code "Astrology" is not a known reporting code'])
    );
  });

  test("reports every missing required field", () => {
    const bare = createTemplateStore([
      parseTemplate(
        [
          "name: bare",
          "version: 1",
          "materialType: BOOK",
          "defaults:",
          "  type.value: PRINTED_BOOK_OT",
          "  acquisition_method.value: PURCHASE",
          "  material_type.value: BOOK",
          "  location.0.library.value: MAIN",
          "  location.0.shelving_location: STACKS",
          "  location.0.quantity: 1"
        ].join("\n")
      )
    ]);

    let caught: unknown;
    try {
      mergePolRecord(bare, "bare", makeLine(), matched, { asOf });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SchemaValidationError);
    if (!(caught instanceof SchemaValidationError)) return;
    expect(caught.issues).toEqual([
      "owner.value is required",
      "reporting_code is required",
      "fund_distribution.0.fund_code.value is required for purchases"
    ]);
  });

  test("unknown templates raise TemplateNotFoundError", () => {
    expect(() => mergePolRecord(store, "serial", makeLine(), matched, { asOf })).toThrow(TemplateNotFoundError);
  });
});
