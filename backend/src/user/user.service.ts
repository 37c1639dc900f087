import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { UserEntity, UserStatus } from '../database/entities';

@Injectable()
export class UserService {
  constructor(
    @InjectRepository(UserEntity)
    private readonly userRepository: Repository<UserEntity>,
  ) {}

  /**
   * Get all users, erased ones included
   * IMPORTANT: passwordHash is never selected (select: false on the column)
   */
  async findAll(): Promise<UserEntity[]> {
    return this.userRepository.find({
      order: {
        createdAt: 'DESC',
      },
    });
  }

  /**
   * Get all users that have been erased
   */
  async findErased(): Promise<UserEntity[]> {
    return this.userRepository.find({
      where: {
        status: UserStatus.ERASED,
      },
      order: {
        anonymizedTime: 'DESC',
      },
    });
  }

  /**
   * Get a single user by ID
   */
  async findOne(id: number): Promise<UserEntity> {
    const user = await this.userRepository.findOne({
      where: { id },
    });

    if (!user) {
      throw new NotFoundException(`User with ID ${id} not found`);
    }

    return user;
  }
}
