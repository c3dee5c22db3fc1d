export {
  PaymentOrchestrator,
  PaymentOrchestratorDeps,
  TransferResult,
  DepositResult,
  ConfirmationResult,
  classifyPaymentIntentStatus,
  classifyCheckoutSession,
} from './payment.service';
export { PaymentController } from './payment.controller';
export { createPaymentRoutes } from './payment.routes';
