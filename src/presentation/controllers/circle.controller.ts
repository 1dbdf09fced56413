import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Post, Put } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiCreatedResponse,
  ApiNoContentResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
} from '@nestjs/swagger';
import {
  AddMemberDto,
  AddMemberResponseDto,
  CircleResponseDto,
  CreateCircleDto,
  CreateCircleResponseDto,
  UpdateCircleDto,
  UpdateCircleResponseDto,
} from '@/application/dtos';
import { CircleService } from '@/application/services';

@Controller('circle')
@ApiTags('circles')
export class CircleController {
  constructor(private readonly circleService: CircleService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a circle with its owner' })
  @ApiCreatedResponse({ description: 'Circle created', type: CreateCircleResponseDto })
  @ApiBadRequestResponse({ description: 'Invalid circle or owner data' })
  async create(@Body() dto: CreateCircleDto): Promise<CreateCircleResponseDto> {
    return this.circleService.create(dto);
  }

  @Get(':id')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Fetch a circle with its owner and members' })
  @ApiParam({ name: 'id', description: 'Circle ID', example: 1 })
  @ApiOkResponse({ description: 'Circle found', type: CircleResponseDto })
  @ApiNotFoundResponse({ description: 'Circle not found' })
  async findById(@Param('id', ParseIntPipe) id: number): Promise<CircleResponseDto> {
    return this.circleService.findById(id);
  }

  @Put(':id')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Update circle name and/or capacity' })
  @ApiParam({ name: 'id', description: 'Circle ID', example: 1 })
  @ApiOkResponse({ description: 'Circle updated', type: UpdateCircleResponseDto })
  @ApiBadRequestResponse({ description: 'Capacity below current headcount or blank name' })
  @ApiNotFoundResponse({ description: 'Circle not found' })
  async update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateCircleDto): Promise<UpdateCircleResponseDto> {
    return this.circleService.update(id, dto);
  }

  @Post(':id/members')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Add a member to a circle' })
  @ApiParam({ name: 'id', description: 'Circle ID', example: 1 })
  @ApiCreatedResponse({ description: 'Member added', type: AddMemberResponseDto })
  @ApiBadRequestResponse({ description: 'Invalid member data or circle is full' })
  @ApiNotFoundResponse({ description: 'Circle not found' })
  async addMember(@Param('id', ParseIntPipe) id: number, @Body() dto: AddMemberDto): Promise<AddMemberResponseDto> {
    return this.circleService.addMember(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a circle and its members' })
  @ApiParam({ name: 'id', description: 'Circle ID', example: 1 })
  @ApiNoContentResponse({ description: 'Circle deleted' })
  @ApiNotFoundResponse({ description: 'Circle not found' })
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    return this.circleService.remove(id);
  }
}
