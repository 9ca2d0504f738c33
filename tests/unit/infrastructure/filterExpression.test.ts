/**
 * Filter expression compiler tests
 */

import { applyFilter, compileFilter } from "../../../src/infrastructure/dynamodb/filterExpression"
import { BRANCH_ATTRIBUTES, DEPARTMENT_ATTRIBUTES } from "../../../src/infrastructure/dynamodb/tableLayout"
import { ALL, NONE, and, or } from "../../../src/application/access/AccessFilter"

describe("compileFilter", () => {
  it("should compile an always-true predicate to no expression", () => {
    expect(compileFilter(ALL, DEPARTMENT_ATTRIBUTES)).toEqual({ expression: null, names: {}, values: {} })
  })

  it("should compile an always-false predicate to null", () => {
    expect(compileFilter(NONE, DEPARTMENT_ATTRIBUTES)).toBeNull()
  })

  it("should compile equality with placeholders", () => {
    expect(compileFilter({ kind: "eq", field: "companyId", value: 10 }, DEPARTMENT_ATTRIBUTES)).toEqual({
      expression: "#f_company_id = :f0",
      names: { "#f_company_id": "company_id" },
      values: { ":f0": 10 },
    })
  })

  it("should compile equality with null to attribute_not_exists", () => {
    expect(compileFilter({ kind: "eq", field: "branchId", value: null }, DEPARTMENT_ATTRIBUTES)).toEqual({
      expression: "attribute_not_exists(#f_branch_id)",
      names: { "#f_branch_id": "branch_id" },
      values: {},
    })
  })

  it("should treat a field the entity does not store as null", () => {
    expect(compileFilter({ kind: "eq", field: "ownerUserId", value: 42 }, DEPARTMENT_ATTRIBUTES)).toBeNull()
    expect(compileFilter({ kind: "eq", field: "ownerUserId", value: null }, DEPARTMENT_ATTRIBUTES)).toEqual({
      expression: null,
      names: {},
      values: {},
    })
    expect(compileFilter({ kind: "in", field: "departmentId", values: [101] }, BRANCH_ATTRIBUTES)).toBeNull()
  })

  it("should compile membership to IN", () => {
    expect(compileFilter({ kind: "in", field: "departmentId", values: [101, 102] }, DEPARTMENT_ATTRIBUTES)).toEqual({
      expression: "#f_department_id IN (:f0, :f1)",
      names: { "#f_department_id": "department_id" },
      values: { ":f0": 101, ":f1": 102 },
    })
  })

  it("should split long membership lists into groups of 100", () => {
    const values = Array.from({ length: 150 }, (_, i) => i + 1)

    const compiled = compileFilter({ kind: "in", field: "departmentId", values }, DEPARTMENT_ATTRIBUTES)

    expect(compiled?.expression?.split(" OR ")).toHaveLength(2)
    expect(Object.keys(compiled?.values ?? {})).toHaveLength(150)
    expect(compiled?.expression?.startsWith("(#f_department_id IN (:f0, ")).toBe(true)
    expect(compiled?.expression?.endsWith(", :f149))")).toBe(true)
  })

  it("should compile the branch scope that covers corporate departments", () => {
    const predicate = or(
      { kind: "eq", field: "branchId", value: 30 },
      and(
        { kind: "eq", field: "companyId", value: 10 },
        { kind: "eq", field: "branchId", value: null },
        { kind: "present", field: "departmentId" }
      )
    )

    expect(compileFilter(predicate, DEPARTMENT_ATTRIBUTES)).toEqual({
      expression:
        "(#f_branch_id = :f0) OR ((#f_company_id = :f1) AND (attribute_not_exists(#f_branch_id)) AND (attribute_exists(#f_department_id)))",
      names: {
        "#f_branch_id": "branch_id",
        "#f_company_id": "company_id",
        "#f_department_id": "department_id",
      },
      values: { ":f0": 30, ":f1": 10 },
    })
  })

  it("should simplify AND with a false clause and OR with a true clause", () => {
    expect(compileFilter(and({ kind: "eq", field: "companyId", value: 10 }, NONE), DEPARTMENT_ATTRIBUTES)).toBeNull()
    expect(
      compileFilter(or({ kind: "eq", field: "companyId", value: 10 }, ALL), DEPARTMENT_ATTRIBUTES)?.expression
    ).toBeNull()
    expect(
      compileFilter(and({ kind: "eq", field: "companyId", value: 10 }, ALL), DEPARTMENT_ATTRIBUTES)?.expression
    ).toBe("#f_company_id = :f0")
  })
})

describe("applyFilter", () => {
  const input = {
    TableName: "organization",
    KeyConditionExpression: "GSI1PK = :parent",
    FilterExpression: "is_active = :active",
    ExpressionAttributeValues: { ":parent": "DEPARTMENT_PARENT#101", ":active": true },
  }

  it("should AND the compiled filter onto an existing filter", () => {
    const compiled = compileFilter({ kind: "eq", field: "companyId", value: 10 }, DEPARTMENT_ATTRIBUTES)
    if (!compiled) {
      throw new Error("expected a filter")
    }

    expect(applyFilter(input, compiled)).toEqual({
      TableName: "organization",
      KeyConditionExpression: "GSI1PK = :parent",
      FilterExpression: "(is_active = :active) AND (#f_company_id = :f0)",
      ExpressionAttributeNames: { "#f_company_id": "company_id" },
      ExpressionAttributeValues: { ":parent": "DEPARTMENT_PARENT#101", ":active": true, ":f0": 10 },
    })
  })

  it("should leave the input alone for an always-true filter", () => {
    expect(applyFilter(input, { expression: null, names: {}, values: {} })).toBe(input)
  })
})
