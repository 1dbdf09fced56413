export { CircleMapper } from './circle.mapper';
export type { CircleRowSet } from './circle.mapper';
export { MemberMapper } from './member.mapper';
