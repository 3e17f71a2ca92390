import * as sql from "../src";

const result = sql.tryConvert(sql.StringValue.of("4.2"), "INTEGER");
if (sql.isValueError(result)) {
  console.info("Conversion error:", result.code, result.message);
}

try {
  sql.convert(sql.BigintValue.of(300), "TINYINT", { column: "ORDERS.QTY" });
} catch (err) {
  if (err instanceof sql.NumericOverflowError) {
    console.info("Overflow:", err.value, "in", err.column);
  }
}

try {
  sql.loadValueConfig({ SQL_VALUES_OBJECT_CACHE_SIZE: "1000" });
} catch (err) {
  if (err instanceof sql.ConfigurationError) {
    console.info("Issues:", err.issues.join("; "));
  }
}
