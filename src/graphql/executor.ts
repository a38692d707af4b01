import { graphql } from 'graphql';
import type { GraphQLFormattedError } from 'graphql';
import schema from './schema';
import { context } from './context';
import { formatError } from '../utils/error-handler';
import type { RideSystem } from '../services/ride-system.service';

export interface OperationResult {
  data?: Record<string, unknown> | null;
  errors?: GraphQLFormattedError[];
}

/**
 * Runs a query or mutation in process against the given booking system.
 */
export const executeOperation = async (
  system: RideSystem,
  source: string,
  variableValues?: Record<string, unknown>
): Promise<OperationResult> => {
  const result = await graphql({
    schema,
    source,
    variableValues,
    contextValue: context(system),
  });

  if (!result.errors) {
    return { data: result.data };
  }

  return { data: result.data, errors: result.errors.map(formatError) };
};
