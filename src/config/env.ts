import dotenv from 'dotenv';
dotenv.config();

export const ENV = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Booking output
  CURRENCY_SYMBOL: process.env.CURRENCY_SYMBOL || '$',
};
