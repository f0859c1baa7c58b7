import { expect } from "chai";
import {
  createColumnId,
  identityOf,
  isConstantExpression,
  outputOf,
  remapOutputs,
  resetColumnIdCounter,
} from "../src/attributeResolver";
import { Expr, Plan, describeExpression, isStatement, parseTableIdentifier } from "../src/planModel";
import { InvalidPlanError } from "../src/errors";

describe("Attribute resolver", () => {
  beforeEach(() => resetColumnIdCounter());

  it("mints sequential column ids", () => {
    expect(createColumnId()).to.equal("col#1");
    expect(createColumnId("agg")).to.equal("agg#2");
  });

  it("keeps the id of an aliased reference and mints one for a computation", () => {
    const t = Plan.table("t", ["a"]);
    const aliased = Expr.as(Expr.col(t, "a"), "renamed");
    const computed = Expr.as(Expr.call("abs", Expr.col(t, "a")));

    expect(t.output).to.deep.equal([{ id: "col#1", name: "a" }]);
    expect(aliased).to.deep.include({ id: "col#1", name: "renamed" });
    expect(computed).to.deep.include({ id: "col#2", name: "abs(a)" });
  });

  it("derives operator output columns", () => {
    const t = Plan.table("t", ["a", "b"]);
    const u = Plan.table("u", ["c"]);
    const window = Plan.window(t, [Expr.as(Expr.window(Expr.call("rank")), "r")]);

    expect(outputOf(Plan.join(t, u)).map((a) => a.name)).to.deep.equal(["a", "b", "c"]);
    expect(outputOf(Plan.join(t, u, "leftanti")).map((a) => a.name)).to.deep.equal(["a", "b"]);
    expect(outputOf(window).map((a) => a.name)).to.deep.equal(["a", "b", "r"]);
    expect(outputOf(Plan.filter(t, Expr.lit(true)))).to.equal(t.output);
    expect(outputOf(Plan.createTableAsSelect("x", t))).to.deep.equal([]);
  });

  it("returns the id at an output position", () => {
    const t = Plan.table("t", ["a", "b"]);

    expect(identityOf(t, 1)).to.equal("col#2");
    expect(() => identityOf(t, 2)).to.throw(
      InvalidPlanError,
      "Relation has no output column at position 2"
    );
  });

  it("pairs inlined columns with the referencing leaf by position", () => {
    const inner = [
      { id: "col#1", name: "a" },
      { id: "col#2", name: "b" },
    ];
    const outer = [
      { id: "col#7", name: "x" },
      { id: "col#8", name: "y" },
    ];

    expect(Array.from(remapOutputs(inner, outer, "v"))).to.deep.equal([
      ["col#1", "col#7"],
      ["col#2", "col#8"],
    ]);
    expect(() => remapOutputs(inner, outer.slice(1), "v")).to.throw(
      InvalidPlanError,
      "v defines 2 columns but is referenced with 1"
    );
  });

  it("recognises expressions built only from literals", () => {
    const t = Plan.table("t", ["a"]);

    expect(isConstantExpression(Expr.call("concat", Expr.lit("a"), Expr.lit(1)))).to.equal(true);
    expect(isConstantExpression(Expr.call("current_date"))).to.equal(true);
    expect(isConstantExpression(Expr.call("concat", Expr.lit("a"), Expr.col(t, "a")))).to.equal(
      false
    );
    expect(isConstantExpression(Expr.countStar())).to.equal(false);
  });
});

describe("Plan model", () => {
  it("parses table identifiers", () => {
    expect(parseTableIdentifier("t")).to.deep.equal({ table: "t" });
    expect(parseTableIdentifier("db.t")).to.deep.equal({ database: "db", table: "t" });
    expect(parseTableIdentifier("c.db.t")).to.deep.equal({ catalog: "c", database: "db", table: "t" });
    expect(() => parseTableIdentifier("a..b")).to.throw("Invalid table identifier: a..b");
  });

  it("describes expressions as default column names", () => {
    const t = Plan.table("t", ["a", "b"]);
    const a = Expr.col(t, "a");
    const b = Expr.col(t, "b");

    expect(describeExpression(Expr.call("and", a, b))).to.equal("(a AND b)");
    expect(describeExpression(Expr.agg("sum", [Expr.call("+", a, Expr.lit(1))]))).to.equal(
      "sum((a + 1))"
    );
    expect(
      describeExpression(Expr.caseWhen([{ when: a, then: Expr.lit(null) }], b))
    ).to.equal("CASE WHEN a THEN NULL ELSE b END");
    expect(describeExpression(Expr.window(Expr.call("rank"), { orderBy: [b] }))).to.equal(
      "rank() OVER (ORDER BY b)"
    );
  });

  it("rejects a reference to a column the node does not produce", () => {
    const t = Plan.table("t", ["a"]);

    expect(() => Expr.col(t, "z")).to.throw("Unknown column z in Relation output");
  });

  it("separates statements from queries", () => {
    expect(isStatement(Plan.command("SetCommand"))).to.equal(true);
    expect(isStatement(Plan.values(["a"]))).to.equal(false);
  });
});
