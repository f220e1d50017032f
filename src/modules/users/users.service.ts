import { Injectable, Logger } from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import { AuditLogService } from '../../common/audit/audit-log.service';
import { ResourceNotFoundException, UserAlreadyExistsException } from '../../common/exceptions/app.exception';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import { UserResponseDto } from './dto/user-response.dto';
import { User } from './entities/user.entity';
import { UserMapper } from './mappers/user.mapper';
import { UserRepository } from './repositories/user.repository';

const SALT_ROUNDS = 10;

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    private readonly userRepository: UserRepository,
    private readonly auditLogService: AuditLogService,
  ) {}

  async create(createUserDto: CreateUserDto): Promise<UserResponseDto> {
    const email = createUserDto.email.toLowerCase();

    if (await this.userRepository.existsByUsername(createUserDto.username)) {
      throw new UserAlreadyExistsException(`Username already exists: ${createUserDto.username}`);
    }
    if (await this.userRepository.existsByEmail(email)) {
      throw new UserAlreadyExistsException(`Email already exists: ${email}`);
    }

    const user = this.userRepository.create({
      ...createUserDto,
      email,
      password: await bcrypt.hash(createUserDto.password, SALT_ROUNDS),
      isActive: true,
    });
    const saved = await this.userRepository.save(user);

    this.logger.log(`Created user ${saved.id}`);
    this.auditLogService.logUserCreated(saved.id, saved.username);
    return UserMapper.toDto(saved);
  }

  async findAll(): Promise<UserResponseDto[]> {
    const users = await this.userRepository.find({ order: { createdAt: 'ASC' } });
    return users.map(UserMapper.toDto);
  }

  async findAllActive(): Promise<UserResponseDto[]> {
    const users = await this.userRepository.findAllActive();
    return users.map(UserMapper.toDto);
  }

  async findOne(id: string): Promise<UserResponseDto> {
    return UserMapper.toDto(await this.getEntity(id));
  }

  async findByUsername(username: string): Promise<UserResponseDto> {
    const user = await this.userRepository.findByUsername(username);
    if (!user) {
      throw new ResourceNotFoundException(`User not found with username: ${username}`);
    }
    return UserMapper.toDto(user);
  }

  async findByEmail(email: string): Promise<UserResponseDto> {
    const user = await this.userRepository.findByEmail(email.toLowerCase());
    if (!user) {
      throw new ResourceNotFoundException(`User not found with email: ${email}`);
    }
    return UserMapper.toDto(user);
  }

  async update(id: string, updateUserDto: UpdateUserDto): Promise<UserResponseDto> {
    const user = await this.getEntity(id);
    const { password, email, ...fields } = updateUserDto;

    if (email !== undefined) {
      const normalized = email.toLowerCase();
      const owner = await this.userRepository.findByEmail(normalized);
      if (owner && owner.id !== id) {
        throw new UserAlreadyExistsException(`Email already exists: ${normalized}`);
      }
      user.email = normalized;
    }

    if (password !== undefined) {
      user.password = await bcrypt.hash(password, SALT_ROUNDS);
    }

    this.userRepository.merge(user, fields);
    const saved = await this.userRepository.save(user);
    this.logger.log(`Updated user ${id}`);
    return UserMapper.toDto(saved);
  }

  /** Deactivates the user; the row and their tasks are kept. */
  async remove(id: string): Promise<void> {
    const user = await this.getEntity(id);
    user.isActive = false;
    await this.userRepository.save(user);
    this.auditLogService.logUserDeleted(id, false);
  }

  async hardRemove(id: string): Promise<void> {
    const user = await this.getEntity(id);
    await this.userRepository.remove(user);
    this.auditLogService.logUserDeleted(id, true);
  }

  async existsByUsername(username: string): Promise<boolean> {
    return this.userRepository.existsByUsername(username);
  }

  async existsByEmail(email: string): Promise<boolean> {
    return this.userRepository.existsByEmail(email.toLowerCase());
  }

  async exists(id: string): Promise<boolean> {
    return this.userRepository.existsBy({ id });
  }

  private async getEntity(id: string): Promise<User> {
    const user = await this.userRepository.findOneBy({ id });
    if (!user) {
      throw new ResourceNotFoundException(`User not found with id: ${id}`);
    }
    return user;
  }
}
