/**
 * Feature Type Registry
 *
 * Registry pattern for feature type definitions. `extract()` walks every
 * registered definition, so supporting another NAS object type means
 * registering one more definition.
 */

import type { TableName } from '../types';
import type { FeatureTypeDefinition } from '../definitions/types';
import { FEATURE_TYPE_DEFINITIONS } from '../definitions';
import { logger } from '../logger';

/**
 * Map of table names to their definitions, in registration order
 */
const featureTypeRegistry = new Map<TableName, FeatureTypeDefinition>();

/**
 * Register a feature type definition.
 * Overwrites any existing definition for the same table.
 *
 * @param definition - The definition to register
 */
export function registerFeatureType(definition: FeatureTypeDefinition): void {
  featureTypeRegistry.set(definition.tableName, definition);

  logger.debug('Registered feature type', {
    table: definition.tableName,
    tag: definition.tag,
    column_count: definition.columns.length,
  });
}

/**
 * Get the definition for a table.
 *
 * @param tableName - The table name
 * @returns The definition, or undefined if not registered
 */
export function getFeatureType(tableName: TableName): FeatureTypeDefinition | undefined {
  return featureTypeRegistry.get(tableName);
}

/**
 * Get the definition for a table, throwing if not found.
 *
 * @param tableName - The table name
 * @returns The definition
 * @throws Error if no definition is registered for that table
 */
export function getFeatureTypeOrThrow(tableName: TableName): FeatureTypeDefinition {
  const definition = featureTypeRegistry.get(tableName);
  if (!definition) {
    throw new Error(`No feature type registered for table: ${tableName}`);
  }
  return definition;
}

/**
 * Check if a definition is registered for a table.
 */
export function hasFeatureType(tableName: TableName): boolean {
  return featureTypeRegistry.has(tableName);
}

/**
 * Get all registered table names.
 */
export function getRegisteredTables(): TableName[] {
  return Array.from(featureTypeRegistry.keys());
}

/**
 * Get all registered definitions, in registration order.
 */
export function getAllFeatureTypes(): FeatureTypeDefinition[] {
  return Array.from(featureTypeRegistry.values());
}

/**
 * Clear all registered definitions.
 * Useful for testing.
 */
export function clearRegistry(): void {
  featureTypeRegistry.clear();
}

/**
 * Register the seven built-in feature types.
 */
export function registerAllFeatureTypes(): void {
  for (const definition of FEATURE_TYPE_DEFINITIONS) {
    registerFeatureType(definition);
  }
}

// Auto-register all feature types on module load
registerAllFeatureTypes();
