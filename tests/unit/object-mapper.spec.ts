import { describe, it, expect, vi, beforeEach } from "vitest";
import { ObjectMapper } from "../../src/core/domain/services/object-mapper.js";
import type { RawRow } from "../../src/core/domain/services/row-materializer.js";
import { field } from "../../src/core/domain/schema/field.js";
import { defineRecord } from "../../src/core/domain/schema/record-schema.js";
import { FieldMappingError } from "../../src/core/domain/errors/index.js";

const User = defineRecord("User", {
  id: field.integer(),
  userName: field.string(),
  email: field.string().optional(),
  age: field.integer().default(-1),
  isActive: field.boolean(),
});

function row(entries: Record<string, string | null>): RawRow {
  return new Map(Object.entries(entries));
}

describe("ObjectMapper", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  it("should match columns to fields case-insensitively", () => {
    const mapper = new ObjectMapper();
    const { value, report } = mapper.mapRow(
      row({ id: "1", username: "alice", email: "alice@example.com", age: "30", isactive: "true" }),
      User,
    );

    expect(value).toEqual({
      id: 1,
      userName: "alice",
      email: "alice@example.com",
      age: 30,
      isActive: true,
    });
    expect(report.failures).toEqual([]);
    expect(report.assigned).toEqual(["id", "userName", "email", "age", "isActive"]);
  });

  it("should map a null cell to null on an optional field", () => {
    const mapper = new ObjectMapper();
    const { value, report } = mapper.mapRow(row({ email: null }), User);

    expect(value.email).toBeNull();
    expect(report.failures).toEqual([]);
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("should keep the default when a null reaches a non-optional field", () => {
    const mapper = new ObjectMapper();
    const { value, report } = mapper.mapRow(row({ id: null, username: "bob" }), User);

    expect(value.id).toBe(0);
    expect(value.userName).toBe("bob");
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]?.reason).toBe("null value for non-optional field");
  });

  it("should contain a coercion failure to its own field", () => {
    const mapper = new ObjectMapper();
    const { value, report } = mapper.mapRow(
      row({ id: "7", username: "carol", age: "abc", isactive: "1" }),
      User,
    );

    expect(value).toEqual({
      id: 7,
      userName: "carol",
      email: null,
      age: -1,
      isActive: true,
    });
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]).toBeInstanceOf(FieldMappingError);
    expect(report.failures[0]?.property).toBe("age");
    expect(report.failures[0]?.value).toBe("abc");
  });

  it("should log contained failures with the column name", () => {
    const mapper = new ObjectMapper();
    mapper.mapRow(row({ age: "abc" }), User);

    expect(console.warn).toHaveBeenCalledWith(
      '[ObjectMapper] Error parsing age: [User.age] not a number, got: "abc"',
    );
  });

  it("should stay quiet when logging is disabled but still call the hook", () => {
    const onFieldError = vi.fn();
    const mapper = new ObjectMapper({ logFieldErrors: false, onFieldError });
    mapper.mapRow(row({ isactive: "maybe" }), User);

    expect(console.warn).not.toHaveBeenCalled();
    expect(onFieldError).toHaveBeenCalledOnce();
    expect(onFieldError.mock.calls[0]?.[0]).toMatchObject({
      property: "isActive",
      column: "isactive",
      reason: "not a boolean",
    });
  });

  it("should ignore columns the schema does not declare", () => {
    const mapper = new ObjectMapper();
    const { value } = mapper.mapRow(row({ id: "3", password_hash: "x" }), User);

    expect(value).toEqual({
      id: 3,
      userName: "",
      email: null,
      age: -1,
      isActive: false,
    });
  });

  describe("mapRows", () => {
    it("should map one object per row in order", () => {
      const mapper = new ObjectMapper();
      const mappings = mapper.mapRows(
        [
          row({ id: "1", username: "alice" }),
          row({ id: "2", username: "bob" }),
          row({ id: "2", username: "bob" }),
        ],
        User,
      );

      expect(mappings.map((m) => [m.value.id, m.value.userName])).toEqual([
        [1, "alice"],
        [2, "bob"],
        [2, "bob"],
      ]);
    });

    it("should keep mapping later rows after a failure", () => {
      const mapper = new ObjectMapper();
      const mappings = mapper.mapRows(
        [row({ id: "x", username: "alice" }), row({ id: "2", username: "bob" })],
        User,
      );

      expect(mappings[0]?.value).toMatchObject({ id: 0, userName: "alice" });
      expect(mappings[1]?.value).toMatchObject({ id: 2, userName: "bob" });
      expect(mappings[1]?.report.failures).toEqual([]);
    });

    it("should return nothing for an empty row set", () => {
      expect(new ObjectMapper().mapRows([], User)).toEqual([]);
    });
  });
});
