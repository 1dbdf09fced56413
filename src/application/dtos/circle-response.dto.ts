import { ApiProperty } from '@nestjs/swagger';
import { Circle, Member } from '@/domain/models';
import { Major } from '@/domain/value-objects';

export class MemberResponseDto {
  @ApiProperty({ description: 'Member ID', example: 1 })
  id: number;

  @ApiProperty({ description: 'Member name', example: 'John Lennon' })
  name: string;

  @ApiProperty({ description: 'Member age', example: 21 })
  age: number;

  @ApiProperty({ description: 'Academic year', example: 3 })
  grade: number;

  @ApiProperty({ description: 'Field of study', enum: Major, example: Major.Music })
  major: Major;

  constructor(member: Member) {
    this.id = member.id.value;
    this.name = member.name;
    this.age = member.age;
    this.grade = member.grade.value;
    this.major = member.major;
  }

  static fromDomain(member: Member): MemberResponseDto {
    return new MemberResponseDto(member);
  }
}

export class CircleResponseDto {
  @ApiProperty({ description: 'Circle ID', example: 1 })
  circle_id: number;

  @ApiProperty({ description: 'Circle name', example: 'Music club' })
  circle_name: string;

  @ApiProperty({ description: 'Maximum headcount, owner included', example: 10 })
  capacity: number;

  @ApiProperty({ description: 'Circle owner', type: MemberResponseDto })
  owner: MemberResponseDto;

  @ApiProperty({ description: 'Members other than the owner', type: [MemberResponseDto] })
  members: MemberResponseDto[];

  constructor(circle: Circle) {
    this.circle_id = circle.id.value;
    this.circle_name = circle.name;
    this.capacity = circle.capacity;
    this.owner = MemberResponseDto.fromDomain(circle.owner);
    this.members = circle.members.map(MemberResponseDto.fromDomain);
  }

  static fromDomain(circle: Circle): CircleResponseDto {
    return new CircleResponseDto(circle);
  }
}

export class CreateCircleResponseDto {
  @ApiProperty({ description: 'Assigned circle ID', example: 1 })
  circle_id: number;

  @ApiProperty({ description: 'Assigned owner member ID', example: 1 })
  owner_id: number;

  constructor(circle: Circle) {
    this.circle_id = circle.id.value;
    this.owner_id = circle.owner.id.value;
  }
}

export class UpdateCircleResponseDto {
  @ApiProperty({ description: 'Updated circle ID', example: 1 })
  id: number;

  constructor(circle: Circle) {
    this.id = circle.id.value;
  }
}

export class AddMemberResponseDto {
  @ApiProperty({ description: 'Circle ID', example: 1 })
  circle_id: number;

  @ApiProperty({ description: 'Assigned member ID', example: 2 })
  member_id: number;

  constructor(circle: Circle, member: Member) {
    this.circle_id = circle.id.value;
    this.member_id = member.id.value;
  }
}
