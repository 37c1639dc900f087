import { Column, Entity, Index, OneToMany, PrimaryGeneratedColumn } from 'typeorm';
import { OrderItemEntity } from './order-item.entity';
import { PaymentEntity } from './payment.entity';

/**
 * An order keeps its own copy of the buyer's contact and shipping data as it was at
 * purchase time, so later edits to the user or address rows never rewrite history.
 */
@Entity('orders')
@Index('order_index_based_user_id', ['userId'])
export class OrderEntity {
  @PrimaryGeneratedColumn({ name: 'order_id', type: 'bigint' })
  id!: number;

  @Column({ name: 'user_id', type: 'bigint' })
  userId!: number;

  @Column({ name: 'shipping_address_id', type: 'bigint', nullable: true })
  shippingAddressId!: number | null;

  // Snapshot at purchase
  @Column({ name: 'email_snapshot', type: 'varchar', length: 255, nullable: true })
  emailSnapshot!: string | null;

  @Column({ name: 'shipping_name', type: 'varchar', length: 255, nullable: true })
  shippingName!: string | null;

  @Column({ name: 'shipping_address', type: 'varchar', length: 255, nullable: true })
  shippingAddress!: string | null;

  @Column({ name: 'shipping_city', type: 'varchar', length: 120, nullable: true })
  shippingCity!: string | null;

  @Column({ name: 'shipping_state', type: 'varchar', length: 120, nullable: true })
  shippingState!: string | null;

  @Column({ name: 'shipping_zip', type: 'varchar', length: 20, nullable: true })
  shippingZip!: string | null;

  @Column({ name: 'ship_country', type: 'char', length: 2, nullable: true })
  shipCountry!: string | null;

  // Financials
  @Column({ type: 'decimal', precision: 12, scale: 2, default: 0 })
  tax!: string;

  @Column({ name: 'shipping_price', type: 'decimal', precision: 12, scale: 2, default: 0 })
  shippingPrice!: string;

  @Column({ name: 'total_cost', type: 'decimal', precision: 12, scale: 2 })
  totalCost!: string;

  @Column({ name: 'is_paid', type: 'boolean', default: false })
  isPaid!: boolean;

  @Column({ name: 'is_delivered', type: 'boolean', default: false })
  isDelivered!: boolean;

  @Column({ name: 'purchase_date', type: 'timestamp', default: () => 'CURRENT_TIMESTAMP' })
  purchaseDate!: Date;

  @Column({ name: 'delivery_date', type: 'timestamp', nullable: true })
  deliveryDate!: Date | null;

  // Relations
  @OneToMany(() => OrderItemEntity, item => item.order)
  items!: OrderItemEntity[];

  @OneToMany(() => PaymentEntity, payment => payment.order)
  payments!: PaymentEntity[];
}
