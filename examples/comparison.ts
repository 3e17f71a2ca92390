import * as sql from "../src";

// Mixed kinds are promoted before comparing: 7 < 10, not "7" > "10".
console.info(sql.compareWithCoercion(sql.IntegerValue.of(7), sql.StringValue.of("10")));

const sizes = new sql.EnumTypeInfo(["small", "medium", "large"]);
const medium = sizes.getValue("medium");
if (!sql.isValueError(medium)) {
  console.info(sql.compareWithCoercion(medium, sql.StringValue.of("large")));
}

const left = sql.ArrayValue.of([sql.IntegerValue.of(1), sql.NullValue.Instance]);
const right = sql.ArrayValue.of([sql.IntegerValue.of(1), sql.IntegerValue.of(2)]);
const outcome = sql.compareWithNull(left, right, true);
console.info(sql.isIncomparable(outcome) ? "unknown" : outcome);

const values: sql.Value[] = [sql.IntegerValue.of(3), sql.NullValue.Instance, sql.StringValue.of("2")];
console.info(values.sort(sql.valueComparator()).map((value) => value.getString()));
