/**
 * In-memory course catalog
 */

import { Course, EvalItem, EvalType } from '../models/course.ts';

export class CourseCatalog {
  private courses: Course[];

  constructor(courses: Course[] = []) {
    this.courses = [...courses];
  }

  list(): Course[] {
    return [...this.courses];
  }

  find(id: number): Course | null {
    return this.courses.find((course) => course.id === id) ?? null;
  }

  /**
   * Case-insensitive name search
   */
  search(term: string): Course[] {
    const needle = term.toLowerCase();
    return this.courses.filter((course) => course.name.toLowerCase().includes(needle));
  }

  /**
   * Courses worth at least the given number of credits
   */
  withMinCredits(credits: number): Course[] {
    return this.courses.filter((course) => course.credits >= credits);
  }
}

export function createSampleCatalog(): CourseCatalog {
  return new CourseCatalog([
    new Course(1, 'Advanced Programming', 6, [
      new EvalItem('Written Test', 0.4, true, EvalType.TEST),
      new EvalItem('Practical Project', 0.6, true, EvalType.PROJECT),
    ]),
    new Course(2, 'Data Structures', 5, [
      new EvalItem('Final Exam', 1.0, true, EvalType.EXAM),
    ]),
    new Course(3, 'Programming Seminar', 2, [
      new EvalItem('Participation', 1.0, false, null),
    ]),
  ]);
}
