export * from './types';
export { HttpCardTransferClient, CardTransferClientOptions } from './cardTransfer.client';
export { StripeGateway, StripeGatewayOptions } from './stripe.gateway';
