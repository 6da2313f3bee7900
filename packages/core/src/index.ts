/**
 * @cqlgen/core
 * Schema interpretation and DAO/DTO code emission
 */

export * from './generation/index.js';
