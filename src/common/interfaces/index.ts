export type { IQuoteSource } from './quote-source.interface';
export type { IOrderGateway } from './order-gateway.interface';
export type {
  ISizingPolicy,
  SizingContext,
} from './sizing-policy.interface';
