export { AddMemberDto } from './add-member.dto';
export {
  AddMemberResponseDto,
  CircleResponseDto,
  CreateCircleResponseDto,
  MemberResponseDto,
  UpdateCircleResponseDto,
} from './circle-response.dto';
export { CreateCircleDto } from './create-circle.dto';
export { ComponentHealthDto, HealthResponseDto } from './health-response.dto';
export type { HealthStatus } from './health-response.dto';
export { UpdateCircleDto } from './update-circle.dto';
