export { checkRecall, suggestGrade, type QuizResult } from './quiz-checker';
