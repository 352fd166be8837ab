/**
 * Base type for one documentation-generator plugin's options, and the registry of
 * codecs that move parameter bags across the process boundary.
 */

import { ConfigError } from "../../core/errors.js";

export abstract class PluginParametersSpec {
  constructor(
    readonly name: string,
    readonly pluginFqn: string,
  ) {}

  /** Freezes every property; called when the configuration phase ends. */
  abstract finalizeValues(): void;
}

/** Converts a parameter bag to and from its at-rest JSON form. */
export interface PluginParametersCodec<T extends PluginParametersSpec> {
  readonly pluginFqn: string;
  encode(value: T, componentsDir: string): string;
  decode(json: string, componentsDir: string): T;
}

export type AnyPluginParametersCodec = {
  readonly pluginFqn: string;
  encode(value: PluginParametersSpec, componentsDir: string): string;
  decode(json: string, componentsDir: string): PluginParametersSpec;
};

export class PluginParametersRegistry {
  private readonly codecs = new Map<string, AnyPluginParametersCodec>();

  register<T extends PluginParametersSpec>(
    codec: PluginParametersCodec<T>,
    isInstance: (value: PluginParametersSpec) => value is T,
  ): this {
    this.codecs.set(codec.pluginFqn, {
      pluginFqn: codec.pluginFqn,
      encode: (value, componentsDir) => {
        if (!isInstance(value)) {
          throw new ConfigError(
            `Parameters '${value.name}' do not match plugin ${codec.pluginFqn}.`,
          );
        }
        return codec.encode(value, componentsDir);
      },
      decode: (json, componentsDir) => codec.decode(json, componentsDir),
    });
    return this;
  }

  encode(value: PluginParametersSpec, componentsDir: string): string {
    return this.codecFor(value.pluginFqn).encode(value, componentsDir);
  }

  decode(pluginFqn: string, json: string, componentsDir: string): PluginParametersSpec {
    return this.codecFor(pluginFqn).decode(json, componentsDir);
  }

  has(pluginFqn: string): boolean {
    return this.codecs.has(pluginFqn);
  }

  private codecFor(pluginFqn: string): AnyPluginParametersCodec {
    const codec = this.codecs.get(pluginFqn);
    if (!codec) {
      throw new ConfigError(`No parameter codec registered for plugin ${pluginFqn}.`);
    }
    return codec;
  }
}
