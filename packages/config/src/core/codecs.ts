import { envCodec } from "../adapters/codecs/env-codec"
import { jsonCodec } from "../adapters/codecs/json-codec"
import { yamlCodec, ymlCodec } from "../adapters/codecs/yaml-codec"
import type { Codec } from "../ports/codec"

/**
 * Codecs by format name.
 */
export class CodecRegistry {
  private readonly codecs = new Map<string, Codec>()

  constructor(codecs: Codec[] = []) {
    for (const codec of codecs) this.register(codec)
  }

  /** Add a codec, replacing any codec already registered under its name. */
  register(codec: Codec): void {
    this.codecs.set(codec.name, codec)
  }

  get(name: string): Codec | undefined {
    return this.codecs.get(name)
  }

  names(): string[] {
    return [...this.codecs.keys()].sort()
  }
}

export const defaultCodecs = new CodecRegistry([jsonCodec, yamlCodec, ymlCodec, envCodec])

export function registerCodec(codec: Codec): void {
  defaultCodecs.register(codec)
}

export function getCodec(name: string): Codec | undefined {
  return defaultCodecs.get(name)
}
