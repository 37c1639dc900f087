export * from './order-response.dto';
