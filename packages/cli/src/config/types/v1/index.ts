import { type Static, Type } from "@sinclair/typebox";

import { LOG_LEVELS } from "../../../logger/types.js";

export const EnvironmentByPathV1 = Type.Object(
  {
    path: Type.String({ minLength: 1 }),
  },
  {
    additionalProperties: false,
    description: "A virtual environment named by its path, relative to the config file",
  }
);
export type EnvironmentByPathV1 = Static<typeof EnvironmentByPathV1>;

export const EnvironmentByNameV1 = Type.Object(
  {
    name: Type.String({ minLength: 1 }),
    baseDir: Type.Optional(Type.String()),
  },
  {
    additionalProperties: false,
    description: "A virtual environment named inside a base directory (`~` allowed)",
  }
);
export type EnvironmentByNameV1 = Static<typeof EnvironmentByNameV1>;

export const EnvironmentV1 = Type.Union([EnvironmentByPathV1, EnvironmentByNameV1], {
  errorMessage: "environment needs either `path` or `name` (with optional `baseDir`)",
});
export type EnvironmentV1 = Static<typeof EnvironmentV1>;

export const IndexOptionsV1 = Type.Object(
  {
    jsonUrlPattern: Type.Optional(
      Type.String({
        format: "uri-template",
        pattern: "\\{package\\}",
        errorMessage: "jsonUrlPattern must be a URL containing {package}",
      })
    ),
    simpleUrl: Type.Optional(Type.String({ format: "uri" })),
  },
  { additionalProperties: false }
);
export type IndexOptionsV1 = Static<typeof IndexOptionsV1>;

export const LogLevelV1 = Type.Union(LOG_LEVELS.map(level => Type.Literal(level)));
export type LogLevelV1 = Static<typeof LogLevelV1>;

export const SettingsV1 = Type.Object({
  version: Type.Literal(1),
  environment: Type.Optional(EnvironmentV1),
  diagnoses: Type.Optional(
    Type.Array(Type.String({ minLength: 1 }), {
      description: "Registered diagnosis names, run in this order",
    })
  ),
  store: Type.Optional(
    Type.String({
      minLength: 1,
      description: '"dict" or the path of an existing folder',
    })
  ),
  installIfMissing: Type.Optional(Type.Boolean()),
  verbose: Type.Optional(Type.Boolean()),
  logLevel: Type.Optional(LogLevelV1),
  index: Type.Optional(IndexOptionsV1),
});
export type SettingsV1 = Static<typeof SettingsV1>;
