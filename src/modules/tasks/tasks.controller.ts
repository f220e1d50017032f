import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { TaskPaginationDto } from './dto/task-pagination.dto';
import { HttpResponse } from '../../types/http-response.interface';
import { PaginatedResponse } from '../../types/pagination.interface';
import { CreateTaskDto } from './dto/create-task.dto';
import { OwnerTasksQueryDto } from './dto/owner-tasks-query.dto';
import { TaskCriteriaDto } from './dto/task-criteria.dto';
import { TaskFilterDto } from './dto/task-filter.dto';
import { TaskResponseDto } from './dto/task-response.dto';
import { TaskSearchQueryDto } from './dto/task-search-query.dto';
import { TaskStatisticsDto } from './dto/task-statistics.dto';
import { TaskStatsQueryDto } from './dto/task-stats-query.dto';
import { UpdateTaskDto } from './dto/update-task.dto';
import { TasksService } from './tasks.service';

@ApiTags('tasks')
@Controller('tasks')
export class TasksController {
  constructor(private readonly tasksService: TasksService) {}

  @Post()
  @ApiOperation({ summary: 'Create a new task' })
  @ApiResponse({ status: 201, description: 'Task created successfully', type: TaskResponseDto })
  @ApiResponse({ status: 400, description: 'Validation failed' })
  @ApiResponse({ status: 404, description: 'Owner not found' })
  async create(@Body() createTaskDto: CreateTaskDto): Promise<HttpResponse<TaskResponseDto>> {
    const task = await this.tasksService.create(createTaskDto);
    return { success: true, data: task, message: 'Task created successfully' };
  }

  @Get()
  @ApiOperation({ summary: 'List tasks matching every filter given in the query string' })
  @ApiResponse({ status: 200, description: 'Page of tasks' })
  @ApiResponse({ status: 400, description: 'Invalid filter or pagination parameter' })
  async findAll(@Query() filter: TaskFilterDto): Promise<HttpResponse<PaginatedResponse<TaskResponseDto>>> {
    const tasks = await this.tasksService.findAll(filter);
    return { success: true, data: tasks, message: 'Tasks retrieved successfully' };
  }

  @Post('search')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'List tasks matching criteria sent as JSON' })
  @ApiResponse({ status: 200, description: 'Page of tasks' })
  @ApiResponse({ status: 400, description: 'Invalid criteria' })
  async search(
    @Body() criteria: TaskCriteriaDto,
    @Query() pagination: TaskPaginationDto,
  ): Promise<HttpResponse<PaginatedResponse<TaskResponseDto>>> {
    const tasks = await this.tasksService.search(criteria, pagination);
    return { success: true, data: tasks, message: 'Tasks retrieved successfully' };
  }

  @Get('search')
  @ApiOperation({ summary: 'Free-text search over title and description' })
  @ApiResponse({ status: 200, description: 'Page of tasks' })
  async searchByQuery(
    @Query() searchQuery: TaskSearchQueryDto,
  ): Promise<HttpResponse<PaginatedResponse<TaskResponseDto>>> {
    const tasks = await this.tasksService.searchByQuery(searchQuery.query, searchQuery);
    return { success: true, data: tasks, message: 'Tasks retrieved successfully' };
  }

  @Get('active')
  @ApiOperation({ summary: 'List tasks that have not been deactivated' })
  @ApiResponse({ status: 200, description: 'Page of tasks' })
  async findActive(@Query() pagination: TaskPaginationDto): Promise<HttpResponse<PaginatedResponse<TaskResponseDto>>> {
    const tasks = await this.tasksService.findActive(pagination);
    return { success: true, data: tasks, message: 'Active tasks retrieved successfully' };
  }

  @Get('stats')
  @ApiOperation({ summary: 'Count tasks by status and priority' })
  @ApiResponse({ status: 200, description: 'Task statistics', type: TaskStatisticsDto })
  async getStats(@Query() query: TaskStatsQueryDto): Promise<HttpResponse<TaskStatisticsDto>> {
    const stats = await this.tasksService.getStats(query.userId);
    return { success: true, data: stats, message: 'Task statistics retrieved successfully' };
  }

  @Get('user/:userId')
  @ApiOperation({ summary: 'List the tasks of one owner' })
  @ApiResponse({ status: 200, description: 'Page of tasks' })
  @ApiResponse({ status: 404, description: 'User not found' })
  async findByOwner(
    @Param('userId', ParseUUIDPipe) userId: string,
    @Query() query: OwnerTasksQueryDto,
  ): Promise<HttpResponse<PaginatedResponse<TaskResponseDto>>> {
    const tasks = await this.tasksService.findByOwner(userId, query, query.activeOnly);
    return { success: true, data: tasks, message: 'Tasks retrieved successfully' };
  }

  @Get('exists/title/:title')
  @ApiOperation({ summary: 'Check whether a task with this exact title exists' })
  async existsByTitle(@Param('title') title: string): Promise<HttpResponse<boolean>> {
    return { success: true, data: await this.tasksService.existsByTitle(title) };
  }

  @Get(':id')
  @ApiOperation({ summary: 'Find a task by ID' })
  @ApiResponse({ status: 200, description: 'Task found', type: TaskResponseDto })
  @ApiResponse({ status: 404, description: 'Task not found' })
  async findOne(@Param('id', ParseUUIDPipe) id: string): Promise<HttpResponse<TaskResponseDto>> {
    const task = await this.tasksService.findOne(id);
    return { success: true, data: task, message: 'Task retrieved successfully' };
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a task' })
  @ApiResponse({ status: 200, description: 'Task updated successfully', type: TaskResponseDto })
  @ApiResponse({ status: 404, description: 'Task not found' })
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() updateTaskDto: UpdateTaskDto,
  ): Promise<HttpResponse<TaskResponseDto>> {
    const task = await this.tasksService.update(id, updateTaskDto);
    return { success: true, data: task, message: 'Task updated successfully' };
  }

  @Delete(':id')
  @ApiOperation({ summary: 'Deactivate a task' })
  @ApiResponse({ status: 200, description: 'Task deactivated' })
  @ApiResponse({ status: 404, description: 'Task not found' })
  async remove(@Param('id', ParseUUIDPipe) id: string): Promise<HttpResponse<void>> {
    await this.tasksService.remove(id);
    return { success: true, message: 'Task deactivated successfully' };
  }

  @Delete(':id/hard')
  @ApiOperation({ summary: 'Permanently delete a task' })
  @ApiResponse({ status: 200, description: 'Task deleted' })
  @ApiResponse({ status: 404, description: 'Task not found' })
  async hardRemove(@Param('id', ParseUUIDPipe) id: string): Promise<HttpResponse<void>> {
    await this.tasksService.hardRemove(id);
    return { success: true, message: 'Task deleted permanently' };
  }
}
