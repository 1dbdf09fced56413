export { CircleId } from './circle-id.vo';
export { Grade, MAX_GRADE, MIN_GRADE } from './grade.vo';
export { Major, MAJORS, parseMajor } from './major.vo';
export { MemberId } from './member-id.vo';
export { NumericId, UNASSIGNED_ID } from './numeric-id.vo';
