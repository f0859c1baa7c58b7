import { expect } from "chai";
import { InMemoryCacheRegistry, InMemoryCatalog, canonicalTableName } from "../src/catalogBridge";
import { DEFAULT_CONFIG } from "../src/config";
import { Plan } from "../src/planModel";

describe("Catalog bridge", () => {
  describe("canonicalTableName", () => {
    it("lowercases and fills the default database", () => {
      expect(canonicalTableName({ table: "Orders" }, DEFAULT_CONFIG)).to.equal("default.orders");
      expect(canonicalTableName({ database: "Sales", table: "Orders" }, DEFAULT_CONFIG)).to.equal(
        "sales.orders"
      );
    });

    it("drops the default catalog and keeps any other", () => {
      expect(
        canonicalTableName({ catalog: "SPARK_CATALOG", database: "db", table: "t" }, DEFAULT_CONFIG)
      ).to.equal("db.t");
      expect(
        canonicalTableName({ catalog: "lake", database: "db", table: "t" }, DEFAULT_CONFIG)
      ).to.equal("lake.db.t");
    });
  });

  describe("InMemoryCatalog", () => {
    it("resolves registered views case-insensitively", () => {
      const plan = Plan.values(["a"]);
      const catalog = new InMemoryCatalog().registerView("Test_DB.V", plan);

      expect(catalog.resolveDefiningPlan("test_db.v")).to.equal(plan);
      expect(catalog.resolveDefiningPlan("TEST_DB.V")).to.equal(plan);
      expect(catalog.resolveDefiningPlan("test_db.other")).to.equal(undefined);
    });

    it("uses its own default database", () => {
      const plan = Plan.values(["a"]);
      const catalog = new InMemoryCatalog({ defaultDatabase: "warehouse" }).registerView("v", plan);

      expect(catalog.canonicalName({ table: "V" })).to.equal("warehouse.v");
      expect(catalog.resolveDefiningPlan("warehouse.v")).to.equal(plan);
    });

    it("forgets dropped views", () => {
      const catalog = new InMemoryCatalog().registerView("db.v", Plan.values(["a"]));

      expect(catalog.dropView("DB.V")).to.equal(true);
      expect(catalog.resolveDefiningPlan("db.v")).to.equal(undefined);
      expect(catalog.dropView("db.v")).to.equal(false);
    });
  });

  describe("InMemoryCacheRegistry", () => {
    it("matches names case-insensitively and symbols by identity", () => {
      const byName = Plan.values(["a"]);
      const bySymbol = Plan.values(["b"]);
      const key = Symbol("cached");
      const registry = new InMemoryCacheRegistry().register("Cached_T", byName).register(key, bySymbol);

      expect(registry.lookup("cached_t")).to.equal(byName);
      expect(registry.lookup(key)).to.equal(bySymbol);
      expect(registry.lookup(Symbol("cached"))).to.equal(undefined);
    });

    it("forgets uncached entries", () => {
      const registry = new InMemoryCacheRegistry().register("c", Plan.values(["a"]));

      expect(registry.uncache("C")).to.equal(true);
      expect(registry.lookup("c")).to.equal(undefined);
    });
  });
});
