import { describe, expect, it } from "vitest";

import { PolicyTable } from "@/backend/domain/policy-table";

describe("PolicyTable", () => {
  it("expands the default developer role to staging-only write permissions", () => {
    const table = PolicyTable.default();

    expect(table.expand(["Developer"])).toEqual([
      "read_logs",
      "read_metrics",
      "deploy_staging",
      "rollback_staging",
    ]);
  });

  it("matches role names case-insensitively and merges duplicates", () => {
    const table = PolicyTable.fromRecord({ Ops: ["read_logs"], ops: ["deploy_staging"] });

    expect(table.hasRole("OPS")).toBe(true);
    expect(table.permissionsFor(" ops ")).toEqual(["read_logs", "deploy_staging"]);
    expect(table.toRecord()).toEqual({ ops: ["read_logs", "deploy_staging"] });
  });

  it("deduplicates permissions across several roles", () => {
    const table = PolicyTable.default();

    expect(table.expand(["observer", "developer"])).toEqual([
      "read_logs",
      "read_metrics",
      "deploy_staging",
      "rollback_staging",
    ]);
  });

  it("ignores unknown roles", () => {
    expect(PolicyTable.default().expand(["intern"])).toEqual([]);
    expect(PolicyTable.default().permissionsFor("intern")).toEqual([]);
  });

  it("rejects malformed records", () => {
    expect(() => PolicyTable.fromRecord({ observer: "read_logs" })).toThrow();
    expect(() => PolicyTable.fromRecord({ observer: [""] })).toThrow();
  });

  it("collects every permission some role grants", () => {
    const table = PolicyTable.fromRecord({ observer: ["read_logs"], auditor: ["read_logs", "read_metrics"] });

    expect([...table.knownPermissions()]).toEqual(["read_logs", "read_metrics"]);
  });

  it("does not let callers mutate the table through returned arrays", () => {
    const table = PolicyTable.default();
    table.permissionsFor("observer").push("deploy_production");

    expect(table.permissionsFor("observer")).toEqual(["read_logs", "read_metrics"]);
  });
});
