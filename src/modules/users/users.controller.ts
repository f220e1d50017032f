import { Body, Controller, Delete, Get, Param, ParseUUIDPipe, Patch, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { HttpResponse } from '../../types/http-response.interface';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import { UserResponseDto } from './dto/user-response.dto';
import { UsersService } from './users.service';

@ApiTags('users')
@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Post()
  @ApiOperation({ summary: 'Create a new user' })
  @ApiResponse({ status: 201, description: 'User created successfully', type: UserResponseDto })
  @ApiResponse({ status: 400, description: 'Validation failed' })
  @ApiResponse({ status: 409, description: 'Username or email already taken' })
  async create(@Body() createUserDto: CreateUserDto): Promise<HttpResponse<UserResponseDto>> {
    const user = await this.usersService.create(createUserDto);
    return { success: true, data: user, message: 'User created successfully' };
  }

  @Get()
  @ApiOperation({ summary: 'List all users' })
  @ApiResponse({ status: 200, type: [UserResponseDto] })
  async findAll(): Promise<HttpResponse<UserResponseDto[]>> {
    return { success: true, data: await this.usersService.findAll() };
  }

  @Get('active')
  @ApiOperation({ summary: 'List active users' })
  @ApiResponse({ status: 200, type: [UserResponseDto] })
  async findAllActive(): Promise<HttpResponse<UserResponseDto[]>> {
    return { success: true, data: await this.usersService.findAllActive() };
  }

  @Get('exists/username/:username')
  @ApiOperation({ summary: 'Check whether a username is taken' })
  async existsByUsername(@Param('username') username: string): Promise<HttpResponse<boolean>> {
    return { success: true, data: await this.usersService.existsByUsername(username) };
  }

  @Get('exists/email/:email')
  @ApiOperation({ summary: 'Check whether an email is registered' })
  async existsByEmail(@Param('email') email: string): Promise<HttpResponse<boolean>> {
    return { success: true, data: await this.usersService.existsByEmail(email) };
  }

  @Get('username/:username')
  @ApiOperation({ summary: 'Get user by username' })
  @ApiResponse({ status: 200, type: UserResponseDto })
  @ApiResponse({ status: 404, description: 'User not found' })
  async findByUsername(@Param('username') username: string): Promise<HttpResponse<UserResponseDto>> {
    return { success: true, data: await this.usersService.findByUsername(username) };
  }

  @Get('email/:email')
  @ApiOperation({ summary: 'Get user by email' })
  @ApiResponse({ status: 200, type: UserResponseDto })
  @ApiResponse({ status: 404, description: 'User not found' })
  async findByEmail(@Param('email') email: string): Promise<HttpResponse<UserResponseDto>> {
    return { success: true, data: await this.usersService.findByEmail(email) };
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get user by ID' })
  @ApiResponse({ status: 200, type: UserResponseDto })
  @ApiResponse({ status: 404, description: 'User not found' })
  async findOne(@Param('id', ParseUUIDPipe) id: string): Promise<HttpResponse<UserResponseDto>> {
    return { success: true, data: await this.usersService.findOne(id) };
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update user by ID' })
  @ApiResponse({ status: 200, type: UserResponseDto })
  @ApiResponse({ status: 404, description: 'User not found' })
  @ApiResponse({ status: 409, description: 'Email already taken' })
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() updateUserDto: UpdateUserDto,
  ): Promise<HttpResponse<UserResponseDto>> {
    const user = await this.usersService.update(id, updateUserDto);
    return { success: true, data: user, message: 'User updated successfully' };
  }

  @Delete(':id')
  @ApiOperation({ summary: 'Deactivate user by ID' })
  @ApiResponse({ status: 200, description: 'User deactivated' })
  @ApiResponse({ status: 404, description: 'User not found' })
  async remove(@Param('id', ParseUUIDPipe) id: string): Promise<HttpResponse<void>> {
    await this.usersService.remove(id);
    return { success: true, message: 'User deactivated successfully' };
  }

  @Delete(':id/hard')
  @ApiOperation({ summary: 'Permanently delete user and their tasks' })
  @ApiResponse({ status: 200, description: 'User deleted' })
  @ApiResponse({ status: 404, description: 'User not found' })
  async hardRemove(@Param('id', ParseUUIDPipe) id: string): Promise<HttpResponse<void>> {
    await this.usersService.hardRemove(id);
    return { success: true, message: 'User deleted permanently' };
  }
}
