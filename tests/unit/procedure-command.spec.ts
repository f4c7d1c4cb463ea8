import { describe, it, expect } from "vitest";
import {
  bindParameters,
  buildProcedureCommand,
  qualifyProcedureName,
} from "../../src/core/domain/value-objects/procedure-command.js";
import { ProcedureError } from "../../src/core/domain/errors/index.js";

describe("bindParameters", () => {
  it("should bind one parameter per field, named verbatim", () => {
    expect(bindParameters("delete_user", { id: 42, name: "alice" })).toEqual([
      { name: "id", value: 42 },
      { name: "name", value: "alice" },
    ]);
  });

  it("should bind nothing without a parameter bag", () => {
    expect(bindParameters("list_users")).toEqual([]);
    expect(bindParameters("list_users", null)).toEqual([]);
  });

  it("should bind undefined as null and keep nulls", () => {
    expect(bindParameters("find_user", { email: undefined, phone: null })).toEqual([
      { name: "email", value: null },
      { name: "phone", value: null },
    ]);
  });

  it("should bind class instance fields but skip methods", () => {
    class Filter {
      constructor(
        readonly minAge: number,
        readonly describe: () => string = () => "filter",
      ) {}
    }

    expect(bindParameters("find_users", new Filter(18))).toEqual([
      { name: "minAge", value: 18 },
    ]);
  });

  it("should reject parameter names that are not identifiers", () => {
    expect(() => bindParameters("find_user", { "id); DROP TABLE users; --": 1 })).toThrow(
      ProcedureError,
    );
  });
});

describe("qualifyProcedureName", () => {
  it("should accept plain and schema-qualified names", () => {
    expect(qualifyProcedureName("get_user")).toBe("get_user");
    expect(qualifyProcedureName("billing.get_invoice")).toBe("billing.get_invoice");
  });

  it("should prefix the default schema onto unqualified names only", () => {
    expect(qualifyProcedureName("get_user", "app")).toBe("app.get_user");
    expect(qualifyProcedureName("billing.get_invoice", "app")).toBe("billing.get_invoice");
  });

  it("should reject invalid names", () => {
    expect(() => qualifyProcedureName("get user")).toThrow("Procedure get user failed: invalid procedure name");
    expect(() => qualifyProcedureName("a.b.c")).toThrow(ProcedureError);
    expect(() => qualifyProcedureName("get_user", "bad-schema")).toThrow(ProcedureError);
  });
});

describe("buildProcedureCommand", () => {
  const parameters = [
    { name: "id", value: 42 },
    { name: "name", value: "alice" },
  ];

  it("should CALL procedures that return nothing", () => {
    expect(buildProcedureCommand("DeleteUser", parameters, "NONE")).toEqual({
      procedure: "DeleteUser",
      parameters,
      text: "CALL DeleteUser(id => $1, name => $2)",
      values: [42, "alice"],
    });
  });

  it("should limit single-row calls", () => {
    expect(buildProcedureCommand("get_user", parameters, "ONE").text).toBe(
      "SELECT * FROM get_user(id => $1, name => $2) LIMIT 1",
    );
  });

  it("should select every row for many-row calls", () => {
    expect(buildProcedureCommand("list_users", [], "MANY").text).toBe(
      "SELECT * FROM list_users()",
    );
  });
});
