/**
 * DTO module template: one interface per table, its serialization tags and a
 * `toJson` function keyed by those tags
 */

export const DTO_TEMPLATE = `// Code generated by cqlgen; DO NOT EDIT.

/*
 * Model that generated this code:
 * {{sourceJson}}
 */
{{#if modelPackage}}

/** @module {{modelPackage}} */
{{/if}}
{{#if imports.identifier}}

import type { types } from 'cassandra-driver';
{{/if}}
{{#if modelImports}}

{{#each modelImports}}
{{this}}
{{/each}}
{{/if}}

export interface {{model}} {
{{#each columns}}
  {{dtoField}};
{{/each}}
}

export const {{model}}JsonTags = {
{{#each columns}}
  {{name}}: '{{jsonTag}}',
{{/each}}
} as const;

export function {{toJsonName}}(dto: {{model}}): Record<string, unknown> {
  return {
{{#each columns}}
    {{jsonTag}}: dto.{{name}},
{{/each}}
  };
}
`;
