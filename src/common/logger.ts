// Library logger
// Tagged consola instance; quiet unless the host raises the level

import { consola } from "consola";

export const logger = consola.withTag("sql-values");
