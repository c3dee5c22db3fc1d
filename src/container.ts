import { config } from './config';
import { CardTransferProvider, PaymentGateway } from './providers/types';
import { BalanceAggregator } from './services/balance/balance.service';
import { LedgerStore } from './services/ledger/ledger.repository';
import { Ledger } from './services/ledger/ledger.service';
import { PaymentOrchestrator } from './services/payment/payment.service';

export interface PaymentServiceDeps {
  store: LedgerStore;
  cardProvider: CardTransferProvider;
  gateway: PaymentGateway | null;
  currency?: string;
}

export interface PaymentServices {
  ledger: Ledger;
  orchestrator: PaymentOrchestrator;
  balances: BalanceAggregator;
}

/**
 * Wire the ledger, orchestrator and aggregator around one store
 */
export const createPaymentServices = (deps: PaymentServiceDeps): PaymentServices => {
  const ledger = new Ledger(deps.store);

  return {
    ledger,
    orchestrator: new PaymentOrchestrator({
      ledger,
      cardProvider: deps.cardProvider,
      gateway: deps.gateway,
      currency: deps.currency ?? config.stripe.currency,
    }),
    balances: new BalanceAggregator(ledger),
  };
};
