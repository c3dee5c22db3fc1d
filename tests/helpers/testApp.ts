import { Application } from 'express';

import { createApp } from '../../src/app';
import { PaymentServices, createPaymentServices } from '../../src/container';
import { FakeCardTransferProvider, FakePaymentGateway } from './fakeProviders';
import { MemoryLedgerStore } from './memoryLedgerStore';

export interface TestContext {
  app: Application;
  services: PaymentServices;
  store: MemoryLedgerStore;
  cardProvider: FakeCardTransferProvider;
  gateway: FakePaymentGateway;
}

/**
 * Fresh app over an in-memory ledger and fake providers
 */
export const createTestContext = (options: { withGateway?: boolean } = {}): TestContext => {
  const store = new MemoryLedgerStore();
  const cardProvider = new FakeCardTransferProvider();
  const gateway = new FakePaymentGateway();

  const services = createPaymentServices({
    store,
    cardProvider,
    gateway: options.withGateway === false ? null : gateway,
    currency: 'usd',
  });

  const app = createApp(services, {
    health: {
      database: () => true,
      redis: () => false,
      gatewayConfigured: () => options.withGateway !== false,
    },
  });

  return { app, services, store, cardProvider, gateway };
};
