import * as sql from "../src";

const provider = sql.snapshotProvider();

const count = sql.convert(sql.StringValue.of(" 42 "), "INTEGER");
console.info(count.getSQL());

const price = sql.convert(sql.DoubleValue.of(19.99), "NUMERIC");
console.info(price.getString(), price.getType().getSQL());

const today = sql.convert(sql.StringValue.of("2024-03-15"), "DATE", { provider });
console.info(today.getSQL());

const span = sql.convert(sql.StringValue.of("1 12"), "INTERVAL_DAY_TO_HOUR");
console.info(span.getSQL(), String(span.asLong()));
