import { Column, CreateDateColumn, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { CategoryEntity } from './category.entity';

@Entity('products')
export class ProductEntity {
  @PrimaryGeneratedColumn({ name: 'product_id', type: 'bigint' })
  id!: number;

  @Column({ name: 'product_name', type: 'varchar', length: 255 })
  name!: string;

  // Decimals come back from mysql2 as strings
  @Column({ type: 'decimal', precision: 12, scale: 2 })
  price!: string;

  @Column({ type: 'decimal', precision: 5, scale: 2, default: 0 })
  discount!: string;

  @Column({ name: 'count_in_stock', type: 'int', default: 0 })
  countInStock!: number;

  @CreateDateColumn({ name: 'created_at', type: 'timestamp' })
  createdAt!: Date;

  @Column({ name: 'category_id', type: 'bigint', nullable: true })
  categoryId!: number | null;

  @Column({ name: 'created_by_user_id', type: 'bigint', nullable: true })
  createdByUserId!: number | null;

  // Relations
  @ManyToOne(() => CategoryEntity, { nullable: true })
  @JoinColumn({ name: 'category_id' })
  category!: CategoryEntity | null;
}
