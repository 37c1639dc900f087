import { Controller, Get, Param, ParseIntPipe } from '@nestjs/common';
import { UserService } from './user.service';
import { UserResponseDto } from './dto';

@Controller('users')
export class UserController {
  constructor(private readonly userService: UserService) {}

  /**
   * GET /api/users
   * Get all users
   */
  @Get()
  async findAll(): Promise<UserResponseDto[]> {
    const users = await this.userService.findAll();
    return UserResponseDto.fromArray(users);
  }

  /**
   * GET /api/users/erased
   * Get erased users (for support and audit tooling)
   */
  @Get('erased')
  async findErased(): Promise<UserResponseDto[]> {
    const users = await this.userService.findErased();
    return UserResponseDto.fromArray(users);
  }

  /**
   * GET /api/users/:id
   * Get a single user by ID, including erasure status
   */
  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number): Promise<UserResponseDto> {
    const user = await this.userService.findOne(id);
    return UserResponseDto.from(user);
  }
}
