// ============================================
// KnowledgeBase
// Course catalogue loaded once at startup, read-only afterwards
// ============================================

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { DataError } from '../shared/errors';

export const CourseRecordSchema = z.object({
   name: z.string().trim().min(1, 'course name is required'),
   format: z.string().trim().default(''),
   costSoles: z.number().nonnegative(),
   objective: z.string().trim().default(''),
   enrollmentLink: z.string().trim().default(''),
});
export type CourseRecord = z.infer<typeof CourseRecordSchema>;

const CourseTableSchema = z
   .array(CourseRecordSchema)
   .min(1, 'knowledge base has no courses')
   .refine(
      (courses) => new Set(courses.map((c) => c.name)).size === courses.length,
      'course names must be unique'
   );

export const NO_COURSES_TEXT = 'No hay información de cursos disponible.';

export class KnowledgeBase {
   private readonly courses: readonly CourseRecord[];

   constructor(courses: CourseRecord[]) {
      this.courses = Object.freeze(courses.map((c) => Object.freeze({ ...c })));
   }

   /**
    * Validate raw table data.
    * @throws DataError when the data does not match the course schema
    */
   static fromData(data: unknown, source = 'inline data'): KnowledgeBase {
      const result = CourseTableSchema.safeParse(data);
      if (!result.success) {
         const details = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
         throw new DataError(`Malformed knowledge base (${source}): ${details}`, source);
      }
      return new KnowledgeBase(result.data);
   }

   /**
    * Read and validate a JSON course file.
    * @throws DataError when the file is missing, unreadable or malformed
    */
   static async load(filePath: string): Promise<KnowledgeBase> {
      let raw: string;
      try {
         raw = await readFile(filePath, 'utf-8');
      } catch {
         throw new DataError(`Knowledge base file not found: ${filePath}`, filePath);
      }

      let data: unknown;
      try {
         data = JSON.parse(raw);
      } catch {
         throw new DataError(`Knowledge base is not valid JSON: ${filePath}`, filePath);
      }

      const knowledgeBase = KnowledgeBase.fromData(data, filePath);
      console.log(
         `📚 KnowledgeBase: Loaded ${knowledgeBase.size} courses from ${filePath}`
      );
      return knowledgeBase;
   }

   get size(): number {
      return this.courses.length;
   }

   getAllCourses(): readonly CourseRecord[] {
      return this.courses;
   }

   courseNames(): string[] {
      return this.courses.map((course) => course.name);
   }

   getCourseByName(name: string): CourseRecord | undefined {
      return this.courses.find((course) => course.name === name);
   }

   /**
    * Render the catalogue for a prompt: one labelled block per course
    */
   formatSnippet(): string {
      if (this.courses.length === 0) {
         return NO_COURSES_TEXT;
      }

      return this.courses
         .map(
            (course) =>
               `Curso: ${course.name}\n` +
               `Formato: ${course.format}\n` +
               `Costo: ${course.costSoles} soles\n` +
               `Objetivo: ${course.objective}\n` +
               `Link: ${course.enrollmentLink}`
         )
         .join('\n\n');
   }
}
