export { Snowflake, SnowflakeInitOptions } from "./core/Snowflake"
export {
  NodeIdResolution,
  NodeIdResolver,
  SnowflakeGenerator,
  SnowflakeGeneratorOptions,
} from "./core/SnowflakeGenerator"
export {
  MAX_NODE_ID,
  MAX_SEQUENCE,
  MAX_TIMESTAMP,
  NODE_ID_BITS,
  SEQUENCE_BITS,
  SNOWFLAKE_EPOCH,
  SnowflakeLayout,
  TIMESTAMP_BITS,
} from "./core/SnowflakeLayout"
export { SnowflakeInput, SnowflakeParser } from "./core/SnowflakeParser"
export { SnowflakeValue } from "./core/SnowflakeValue"
export {
  ALPHABET,
  DecodeFailureReason,
  DecodeResult,
  ENCODED_LENGTH,
  ZBase32Codec,
} from "./encoding/ZBase32Codec"
export { SnowflakeMongoAdapter, SnowflakeDocument } from "./adapters/mongo/SnowflakeMongoAdapter"
export { BigIntColumnValue, SnowflakePostgresAdapter } from "./adapters/postgres/SnowflakePostgresAdapter"
export { SnowflakeFields, SnowflakeMetadata } from "./types"
export { Clock, TimeUtils } from "./utils/TimeUtils"
