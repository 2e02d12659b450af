/**
 * Runtime JSON Schema that validates a pipeline document using ajv.
 *
 * Kept as a plain object (not a TypeScript type) so it can be fed
 * directly to `new Ajv().compile(PIPELINE_JSON_SCHEMA)`. Cross-field
 * rules (unique names, edge direction) are checked by the loader.
 */

const absolutePath = { type: 'string', pattern: '^/' };

export const PIPELINE_JSON_SCHEMA = {
  $id: 'urn:stagecraft:pipeline',
  type: 'object' as const,
  required: ['name', 'stages'],
  additionalProperties: false,

  $defs: {
    input: {
      type: 'object' as const,
      required: ['from', 'to'],
      additionalProperties: false,
      properties: {
        from: { type: 'string', minLength: 1 },
        to: absolutePath,
        exclude: { type: 'array', items: { type: 'string', minLength: 1 } },
      },
    },

    launch: {
      type: 'object' as const,
      required: ['variant'],
      additionalProperties: false,
      properties: {
        variant: { type: 'string', enum: ['static', 'process'] },
        command: { type: 'array', minItems: 1, items: { type: 'string' } },
        documentRoot: absolutePath,
        gracePeriodMs: { type: 'integer', minimum: 0 },
        healthCheckTimeoutMs: { type: 'integer', minimum: 1 },
      },
    },

    stage: {
      type: 'object' as const,
      required: ['name', 'image'],
      additionalProperties: false,
      properties: {
        name: { type: 'string', pattern: '^[A-Za-z0-9][A-Za-z0-9_-]*$' },
        image: { type: 'string', minLength: 1 },
        workdir: absolutePath,
        env: {
          type: 'object',
          additionalProperties: { type: 'string' },
        },
        inputs: { type: 'array', items: { $ref: '#/$defs/input' } },
        commands: { type: 'array', items: { type: 'string', minLength: 1 } },
        artifacts: { type: 'array', items: absolutePath },
        ports: {
          type: 'array',
          items: {
            anyOf: [
              { type: 'integer', minimum: 1, maximum: 65535 },
              { type: 'string', pattern: '^(\\d{1,5}:)?\\d{1,5}$' },
            ],
          },
        },
        launch: { $ref: '#/$defs/launch' },
      },
    },

    transfer: {
      type: 'object' as const,
      required: ['from', 'to'],
      additionalProperties: false,
      properties: {
        from: { type: 'string', pattern: '^[A-Za-z0-9][A-Za-z0-9_-]*:/' },
        to: { type: 'string', pattern: '^[A-Za-z0-9][A-Za-z0-9_-]*:/' },
      },
    },
  },

  properties: {
    name: { type: 'string', pattern: '^[A-Za-z0-9][A-Za-z0-9_.-]*$' },
    stages: {
      type: 'array',
      minItems: 1,
      items: { $ref: '#/$defs/stage' },
    },
    transfers: {
      type: 'array',
      items: { $ref: '#/$defs/transfer' },
    },
  },
} as const;
