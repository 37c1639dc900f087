import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

@Entity('categories')
export class CategoryEntity {
  @PrimaryGeneratedColumn({ name: 'category_id', type: 'bigint' })
  id!: number;

  @Column({ type: 'varchar', length: 120, unique: true })
  name!: string;
}
