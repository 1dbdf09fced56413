export { CircleEntity } from './circle.orm-entity';
export { MemberEntity } from './member.orm-entity';
