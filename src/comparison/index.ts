// Comparison
// Ordering and three-valued comparison

export {
  INCOMPARABLE,
  compareTo,
  compareTypeSafe,
  compareWithCoercion,
  compareWithNull,
  isIncomparable,
  tryCompareTo,
  tryCompareTypeSafe,
  tryCompareWithCoercion,
  tryCompareWithNull,
  valueComparator,
} from "./compare";
/** Marker for an unknown comparison result. */
export type { Incomparable } from "./compare";
