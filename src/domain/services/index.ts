export { OrderPricingService, LineRequest } from './order-pricing.service';
