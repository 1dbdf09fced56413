import { Inject, Injectable } from '@nestjs/common';
import { NotFoundError } from '@/domain/errors';
import { Circle, Member } from '@/domain/models';
import type { CircleRepository } from '@/domain/repositories';
import { CIRCLE_REPOSITORY } from '@/domain/repositories';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';
import { unwrap } from '@/domain/shared';
import { CircleId, Grade, parseMajor } from '@/domain/value-objects';
import {
  AddMemberDto,
  AddMemberResponseDto,
  CircleResponseDto,
  CreateCircleDto,
  CreateCircleResponseDto,
  UpdateCircleDto,
  UpdateCircleResponseDto,
} from '@/application/dtos';

const CIRCLE_NOT_FOUND = 'Circle not found';

/**
 * Use cases for circles. Each one builds and validates the domain objects
 * first, so a ValidationError is raised before the store is touched,
 * then calls exactly one repository write.
 */
@Injectable()
export class CircleService {
  constructor(
    @Inject(CIRCLE_REPOSITORY)
    private readonly circleRepository: CircleRepository,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {}

  /**
   * Creates a circle whose only member is its owner.
   * @returns The ids assigned to the circle and its owner
   * @throws {ValidationError} When any owner or circle field is invalid
   */
  async create(dto: CreateCircleDto): Promise<CreateCircleResponseDto> {
    this.logger.log('Creating circle', { circleName: dto.circle_name });

    const owner = this.buildMember(dto.owner_name, dto.owner_age, dto.owner_grade, dto.owner_major);
    const circle = unwrap(Circle.create(dto.circle_name, dto.capacity, owner));

    const created = await this.circleRepository.create(circle);

    this.logger.log('Circle created successfully', {
      circleId: created.id.value,
      ownerId: created.owner.id.value,
    });

    return new CreateCircleResponseDto(created);
  }

  /**
   * @throws {NotFoundError} When the circle doesn't exist
   */
  async findById(id: number): Promise<CircleResponseDto> {
    this.logger.log('Fetching circle by id', { id });

    const circle = await this.requireCircle(id);

    return CircleResponseDto.fromDomain(circle);
  }

  /**
   * Renames and/or resizes a circle. Omitted fields keep their value.
   * @throws {NotFoundError} When the circle doesn't exist
   * @throws {ValidationError} When the name is blank or capacity is below the headcount
   */
  async update(id: number, dto: UpdateCircleDto): Promise<UpdateCircleResponseDto> {
    this.logger.log('Updating circle', { id });

    const circle = await this.requireCircle(id);
    // null in the body means "not supplied"
    const changed = unwrap(
      circle.update({ name: dto.circle_name ?? undefined, capacity: dto.capacity ?? undefined }),
    );

    const saved = await this.circleRepository.update(changed);
    if (!saved) {
      throw new NotFoundError(CIRCLE_NOT_FOUND);
    }

    this.logger.log('Circle updated successfully', { id });

    return new UpdateCircleResponseDto(saved);
  }

  /**
   * Adds a new member to a circle.
   * @throws {NotFoundError} When the circle doesn't exist
   * @throws {ValidationError} When the member is invalid or the circle is full
   */
  async addMember(id: number, dto: AddMemberDto): Promise<AddMemberResponseDto> {
    this.logger.log('Adding member to circle', { id, memberName: dto.name });

    const circle = await this.requireCircle(id);
    const member = this.buildMember(dto.name, dto.age, dto.grade, dto.major);
    const changed = unwrap(circle.addMember(member));

    const saved = await this.circleRepository.update(changed);
    if (!saved) {
      throw new NotFoundError(CIRCLE_NOT_FOUND);
    }

    // the repository keeps member order, so the new member is last
    const joined = saved.members[saved.members.length - 1];

    this.logger.log('Member added successfully', { id, memberId: joined.id.value });

    return new AddMemberResponseDto(saved, joined);
  }

  /**
   * Deletes a circle with all its members.
   * @throws {NotFoundError} When the circle doesn't exist
   */
  async remove(id: number): Promise<void> {
    this.logger.log('Deleting circle', { id });

    const circle = await this.requireCircle(id);

    const deleted = await this.circleRepository.delete(circle);
    if (!deleted) {
      throw new NotFoundError(CIRCLE_NOT_FOUND);
    }

    this.logger.log('Circle deleted successfully', { id });
  }

  private async requireCircle(id: number): Promise<Circle> {
    const circle = await this.circleRepository.findById(CircleId.of(id));

    if (!circle) {
      throw new NotFoundError(CIRCLE_NOT_FOUND);
    }

    return circle;
  }

  /** @throws {ValidationError} From the first field that fails */
  private buildMember(name: string, age: number, grade: number, major: string): Member {
    return unwrap(Member.create(name, age, unwrap(Grade.create(grade)), unwrap(parseMajor(major))));
  }
}
