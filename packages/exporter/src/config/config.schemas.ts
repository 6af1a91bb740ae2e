/**
 * Typebox schemas for the configuration file.
 */

import { Type, type Static } from "@sinclair/typebox";

// ---------------------------------------------------------------------------
// Shared fields
// ---------------------------------------------------------------------------

/** A proxy URL; `null` or the string "None" mean no proxy */
export const ProxySetting = Type.Union([Type.String(), Type.Null()]);

export type ProxySetting = Static<typeof ProxySetting>;

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

/** The `config` section */
export const GlobalSection = Type.Object(
  {
    scrape_time_delay: Type.Optional(Type.Integer({ minimum: 1 })),
    http_proxy: Type.Optional(ProxySetting),
    https_proxy: Type.Optional(ProxySetting),
    verbose: Type.Optional(Type.Boolean()),
    listen_address: Type.Optional(Type.String({ minLength: 1 })),
    listen_port: Type.Optional(Type.Integer({ minimum: 0, maximum: 65535 })),
    timeout_ms: Type.Optional(Type.Integer({ minimum: 1 })),
    log_level: Type.Optional(
      Type.Union([
        Type.Literal("fatal"),
        Type.Literal("error"),
        Type.Literal("warn"),
        Type.Literal("info"),
        Type.Literal("debug"),
        Type.Literal("trace"),
      ]),
    ),
  },
  { additionalProperties: false },
);

export type GlobalSection = Static<typeof GlobalSection>;

/** Any other section: one monitored server */
export const TargetSection = Type.Object(
  {
    url: Type.String({ minLength: 1 }),
    http_proxy: Type.Optional(ProxySetting),
    https_proxy: Type.Optional(ProxySetting),
  },
  { additionalProperties: false },
);

export type TargetSection = Static<typeof TargetSection>;
