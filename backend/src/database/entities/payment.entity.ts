import { Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { OrderEntity } from './order.entity';

@Entity('payments')
@Index('index_payments_based_order_id', ['orderId'])
export class PaymentEntity {
  @PrimaryGeneratedColumn({ name: 'payment_id', type: 'bigint' })
  id!: number;

  @Column({ name: 'order_id', type: 'bigint' })
  orderId!: number;

  // Processor reference and card suffix are kept for reconciliation
  @Column({ name: 'psp_ref', type: 'varchar', length: 128, nullable: true })
  pspRef!: string | null;

  @Column({ type: 'char', length: 4, nullable: true })
  last4!: string | null;

  @Column({ name: 'billing_name', type: 'varchar', length: 255, nullable: true })
  billingName!: string | null;

  @Column({ name: 'billing_address', type: 'varchar', length: 255, nullable: true })
  billingAddress!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamp' })
  createdAt!: Date;

  // Relations
  @ManyToOne(() => OrderEntity, order => order.payments)
  @JoinColumn({ name: 'order_id' })
  order!: OrderEntity;
}
