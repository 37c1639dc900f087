import { UserEntity, UserStatus } from '../../database/entities';

export class UserResponseDto {
  id!: number;
  firstName!: string | null;
  lastName!: string | null;
  username!: string | null;
  email!: string | null;
  status!: UserStatus;
  anonymizedTime!: Date | null;
  anonTag!: string | null;
  createdAt!: Date;

  // IMPORTANT: passwordHash is intentionally excluded from response

  static from(entity: UserEntity): UserResponseDto {
    const dto = new UserResponseDto();
    dto.id = Number(entity.id);
    dto.firstName = entity.firstName;
    dto.lastName = entity.lastName;
    dto.username = entity.username;
    dto.email = entity.email;
    dto.status = entity.status;
    dto.anonymizedTime = entity.anonymizedTime;
    dto.anonTag = entity.anonTag;
    dto.createdAt = entity.createdAt;
    return dto;
  }

  static fromArray(entities: UserEntity[]): UserResponseDto[] {
    return entities.map(entity => UserResponseDto.from(entity));
  }
}
