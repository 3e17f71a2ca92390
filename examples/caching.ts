import * as sql from "../src";

const cache = sql.createValueCache(sql.loadValueConfig({ SQL_VALUES_OBJECT_CACHE_RETENTION: "strong" }));

const a = sql.convert(sql.StringValue.of("7"), "INTEGER", { cache });
const b = sql.convert(sql.StringValue.of("007"), "INTEGER", { cache });

console.info("same instance:", a === b);
console.info(cache.stats());
