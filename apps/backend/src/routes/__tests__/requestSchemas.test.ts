import { describe, it, expect } from "vitest";
import { cancelBodySchema, recognizeFieldsSchema } from "../recognition";
import { drugIdParamSchema, featureSearchQuerySchema, nameSearchQuerySchema } from "../catalog";

describe("recognizeFieldsSchema", () => {
  it("accepts an empty form", () => {
    const fields = recognizeFieldsSchema.parse({});
    expect(fields.mode).toBeUndefined();
    expect(fields.top_k).toBeUndefined();
    expect(fields.request_id).toBeUndefined();
  });

  it("coerces and trims multipart text fields", () => {
    const fields = recognizeFieldsSchema.parse({
      mode: "ocr",
      top_k: "3",
      shape: " round ",
      color: "white",
      request_id: "scan-42",
    });

    expect(fields).toMatchObject({ mode: "ocr", top_k: 3, shape: "round", color: "white", request_id: "scan-42" });
  });

  it("treats blank fields as absent", () => {
    const fields = recognizeFieldsSchema.parse({ mode: "", top_k: "  ", shape: "" });
    expect(fields.mode).toBeUndefined();
    expect(fields.top_k).toBeUndefined();
    expect(fields.shape).toBeUndefined();
  });

  it("accepts the legacy model field", () => {
    expect(recognizeFieldsSchema.parse({ model: "prescription" }).model).toBe("prescription");
  });

  it("rejects unknown modes and bad top_k values", () => {
    expect(recognizeFieldsSchema.safeParse({ mode: "turbo" }).success).toBe(false);
    expect(recognizeFieldsSchema.safeParse({ top_k: "0" }).success).toBe(false);
    expect(recognizeFieldsSchema.safeParse({ top_k: "2.5" }).success).toBe(false);
    expect(recognizeFieldsSchema.safeParse({ top_k: "many" }).success).toBe(false);
  });
});

describe("cancelBodySchema", () => {
  it("requires a non-blank request_id", () => {
    expect(cancelBodySchema.parse({ request_id: " scan-42 " })).toEqual({ request_id: "scan-42" });
    expect(cancelBodySchema.safeParse({ request_id: "   " }).success).toBe(false);
    expect(cancelBodySchema.safeParse({}).success).toBe(false);
  });
});

describe("catalog query schemas", () => {
  it("parses drug ids", () => {
    expect(drugIdParamSchema.parse("12")).toBe(12);
    expect(drugIdParamSchema.safeParse("0").success).toBe(false);
    expect(drugIdParamSchema.safeParse("abc").success).toBe(false);
  });

  it("defaults and bounds name search parameters", () => {
    expect(nameSearchQuerySchema.parse({})).toEqual({ q: "", limit: 20 });
    expect(nameSearchQuerySchema.parse({ q: "asp", limit: "5" })).toEqual({ q: "asp", limit: 5 });
    expect(nameSearchQuerySchema.safeParse({ limit: "101" }).success).toBe(false);
  });

  it("trims feature search parameters and drops blank ones", () => {
    expect(featureSearchQuerySchema.parse({ shape: " round ", color: "", label: "A1", limit: "5" })).toEqual({
      shape: "round",
      color: undefined,
      label: "A1",
      limit: 5,
    });
    expect(featureSearchQuerySchema.parse({})).toEqual({ limit: 20 });
    expect(featureSearchQuerySchema.safeParse({ limit: "0" }).success).toBe(false);
  });
});
