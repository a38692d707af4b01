import type { GraphQLError, GraphQLFormattedError } from 'graphql';
import { ErrorResponse } from './responses';

export const formatError = (error: GraphQLError): GraphQLFormattedError => {
  const formattedError = error.toJSON();

  if (error.originalError instanceof ErrorResponse) {
    const customError = error.originalError;
    return {
      ...formattedError,
      message: customError.message,
      extensions: {
        ...formattedError.extensions,
        code: customError.code,
        details: customError.details,
      },
    };
  }

  console.error('GraphQL Error:', formattedError);
  return formattedError;
};
