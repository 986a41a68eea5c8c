/**
 * Re-export all dialects for tree-shakeable imports
 */

export { PostgresDialect } from "./postgres.js"
export { MySQLDialect } from "./mysql.js"
export { BigQueryDialect } from "./bigquery.js"
export { SnowflakeDialect } from "./snowflake.js"
export { SparkDialect } from "./spark.js"

import { BigQueryDialect } from "./bigquery.js"
import { MySQLDialect } from "./mysql.js"
import { PostgresDialect } from "./postgres.js"
import { SnowflakeDialect } from "./snowflake.js"
import { SparkDialect } from "./spark.js"

export const dialects = {
  PostgresDialect,
  MySQLDialect,
  BigQueryDialect,
  SnowflakeDialect,
  SparkDialect,
}
