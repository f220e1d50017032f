import { Injectable } from '@nestjs/common';
import { DataSource, Repository } from 'typeorm';
import { User } from '../entities/user.entity';

@Injectable()
export class UserRepository extends Repository<User> {
  constructor(dataSource: DataSource) {
    super(User, dataSource.createEntityManager());
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.findOneBy({ username });
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.findOneBy({ email });
  }

  async findAllActive(): Promise<User[]> {
    return this.find({ where: { isActive: true }, order: { createdAt: 'ASC' } });
  }

  async existsByUsername(username: string): Promise<boolean> {
    return this.existsBy({ username });
  }

  async existsByEmail(email: string): Promise<boolean> {
    return this.existsBy({ email });
  }
}
