import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn } from 'typeorm';

export enum UserStatus {
  ACTIVE = 'active',
  ERASED = 'erased',
}

@Entity('users')
export class UserEntity {
  @PrimaryGeneratedColumn({ name: 'user_id', type: 'bigint' })
  id!: number;

  @Column({ name: 'first_name', type: 'varchar', length: 100, nullable: true })
  firstName!: string | null;

  @Column({ name: 'last_name', type: 'varchar', length: 100, nullable: true })
  lastName!: string | null;

  @Column({ type: 'varchar', length: 64, nullable: true, unique: true })
  username!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  email!: string | null;

  @Column({ name: 'password_hash', type: 'varbinary', length: 255, select: false })
  passwordHash!: Buffer;

  @CreateDateColumn({ name: 'created_at', type: 'timestamp' })
  createdAt!: Date;

  // Set once, when the user is erased
  @Column({ name: 'anonymized_time', type: 'timestamp', nullable: true })
  anonymizedTime!: Date | null;

  @Column({ name: 'anon_tag', type: 'varchar', length: 64, nullable: true })
  anonTag!: string | null;

  @Column({ type: 'varchar', length: 16, default: UserStatus.ACTIVE })
  status!: UserStatus;
}
