export * from './category.entity';
export * from './order-item.entity';
export * from './order.entity';
export * from './payment.entity';
export * from './product.entity';
export * from './shipping-address.entity';
export * from './user.entity';
