import { expect } from "chai";
import { Expr, Plan } from "../src/planModel";
import type { PlanNode } from "../src/planModel";
import { extractLineage, extractLineageFromSql } from "../src/extractor";
import type { PlanProvider } from "../src/extractor";
import type { Catalog } from "../src/catalogBridge";
import { UnresolvedPlanError } from "../src/errors";
import { Logger } from "../src/logger";

const silent = new Logger({ silent: true });

describe("extractLineage", () => {
  it("returns lineage and no warnings for a supported plan", () => {
    const t = Plan.table("test_db.t", ["a"]);
    const result = extractLineage(Plan.select(t, "a"), { logger: silent });

    expect(result).to.deep.equal({
      success: true,
      lineage: {
        sources: ["test_db.t"],
        targets: [],
        columns: [{ column: "a", sources: ["test_db.t.a"] }],
      },
      warnings: [],
    });
  });

  it("returns lineage errors instead of throwing them", () => {
    const result = extractLineage(Plan.project(Plan.unresolved("nowhere"), []), {
      logger: silent,
    });

    expect(result.success).to.equal(false);
    if (result.success) return;
    expect(result.error).to.be.instanceOf(UnresolvedPlanError);
    expect(result.error.code).to.equal("UNRESOLVED_PLAN");
  });

  it("rethrows errors that are not lineage errors", () => {
    const broken: Catalog = {
      canonicalName: () => {
        throw new TypeError("catalog offline");
      },
      resolveDefiningPlan: () => undefined,
    };
    const plan = Plan.select(Plan.table("test_db.t", ["a"]), "a");

    expect(() => extractLineage(plan, { catalog: broken, logger: silent })).to.throw(
      TypeError,
      "catalog offline"
    );
  });

  it("names tables outside the default catalog with their catalog", () => {
    const t = Plan.table("other_cat.test_db.t", ["a"]);
    const result = extractLineage(Plan.select(t, "a"), { logger: silent });

    if (!result.success) throw result.error;
    expect(result.lineage.sources).to.deep.equal(["other_cat.test_db.t"]);
    expect(result.lineage.columns).to.deep.equal([
      { column: "a", sources: ["other_cat.test_db.t.a"] },
    ]);
  });

  it("fills the configured default database", () => {
    const t = Plan.table("T", ["a"]);
    const result = extractLineage(Plan.select(t, "a"), {
      logger: silent,
      config: { defaultDatabase: "warehouse" },
    });

    if (!result.success) throw result.error;
    expect(result.lineage.sources).to.deep.equal(["warehouse.t"]);
  });

  it("logs unsupported operators as warnings", () => {
    const messages: string[] = [];
    const original = console.warn;
    console.warn = (message: string) => {
      messages.push(message);
    };
    try {
      const t = Plan.table("test_db.t", ["a"]);
      extractLineage(Plan.generic("Sample", [t]), {
        logger: new Logger({ level: "warn", context: "lineage" }),
      });
    } finally {
      console.warn = original;
    }

    expect(messages).to.deep.equal([
      '[warn] (lineage:propagator) No lineage rule for operator Sample; using passthrough {"operator":"Sample"}',
    ]);
  });
});

describe("extractLineageFromSql", () => {
  const t = Plan.table("test_db.t", ["a", "b"]);
  const plans: Record<string, PlanNode> = {
    "SELECT count(*) AS n FROM test_db.t": Plan.aggregate(t, [], [Expr.as(Expr.countStar(), "n")]),
  };
  const planner: PlanProvider = (sql) => {
    const plan = plans[sql];
    if (!plan) throw new SyntaxError(`cannot plan: ${sql}`);
    return plan;
  };

  it("extracts lineage from the planned statement", () => {
    const result = extractLineageFromSql("SELECT count(*) AS n FROM test_db.t", planner, {
      logger: silent,
    });

    if (!result.success) throw result.error;
    expect(result.lineage.columns).to.deep.equal([
      { column: "n", sources: ["test_db.t.__count__"] },
    ]);
  });

  it("lets planner failures through unchanged", () => {
    expect(() => extractLineageFromSql("SELEC 1", planner, { logger: silent })).to.throw(
      SyntaxError,
      "cannot plan: SELEC 1"
    );
  });
});
