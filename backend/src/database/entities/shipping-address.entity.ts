import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity('shipping_addresses')
@Index(['userId'])
export class ShippingAddressEntity {
  @PrimaryGeneratedColumn({ name: 'shipping_address_id', type: 'bigint' })
  id!: number;

  @Column({ name: 'user_id', type: 'bigint' })
  userId!: number;

  @Column({ type: 'varchar', length: 255, nullable: true })
  street!: string | null;

  @Column({ type: 'varchar', length: 120, nullable: true })
  city!: string | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  zip!: string | null;

  @Column({ type: 'varchar', length: 120, nullable: true })
  state!: string | null;

  @Column({ name: 'phone_number', type: 'varchar', length: 50, nullable: true })
  phoneNumber!: string | null;
}
