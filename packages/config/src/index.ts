export { envCodec } from "./adapters/codecs/env-codec"
export { jsonCodec } from "./adapters/codecs/json-codec"
export { createYamlCodec, yamlCodec, ymlCodec } from "./adapters/codecs/yaml-codec"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { FileSource, type FileSourceOptions } from "./adapters/file/file-source"
export { MemorySource, type MemorySourceOptions } from "./adapters/memory/memory-source"
export { CodecRegistry, defaultCodecs, getCodec, registerCodec } from "./core/codecs"
export { Config, createConfig } from "./core/config"
export { createDecoder, defaultDecoder } from "./core/decoder"
export { ConfigError, type ConfigErrorCode, isCancellation } from "./core/errors"
export { deepMerge } from "./core/merge"
export { type ConfigOptions, DEFAULT_WATCH_RETRY_DELAY } from "./core/options"
export { QueueWatcher } from "./core/queue-watcher"
export { TreeReader, type TreeReaderOptions } from "./core/reader"
export {
  createPlaceholderResolver,
  defaultResolver,
  type PlaceholderResolverOptions,
} from "./core/resolver"
export { AtomicValue, MissingValue } from "./core/value"
export type { Codec } from "./ports/codec"
export type { IConfig, Observer, ScanTarget } from "./ports/config"
export type { KeyValue } from "./ports/key-value"
export type { Decoder, MergeFn, Reader, Resolver, Tree } from "./ports/reader"
export type { Source, Watcher } from "./ports/source"
export type { FoundValue, NotFoundValue, Value, ValueAccessors } from "./ports/value"
