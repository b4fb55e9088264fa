export * from './issuing.types';
export * from './payment.types';
