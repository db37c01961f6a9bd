export { StudyService, type GradeInput } from './study-service';
