import FarePolicyFactory from './fare.factory';

const fareResolvers = {
  Query: {
    fareQuote: (
      _: unknown,
      { distance, category }: { distance: number; category: string }
    ) => FarePolicyFactory.quote(distance, category),
  },
};

export default fareResolvers;
