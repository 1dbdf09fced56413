export { Circle } from './circle.model';
export type { CircleProps, UpdateCircleProps } from './circle.model';
export { Member } from './member.model';
export type { MemberProps } from './member.model';
