type HasInstructor = { instructor: string };

// "Lee," then "Ey" on the next line -> "Lee, Ey"
export class ContinuationMerger<T extends HasInstructor> {
  private last: T | null = null;
  merged = 0;

  offer(facultyText: string): boolean {
    const text = facultyText.trim();
    if (!this.last || !text || !this.last.instructor.trimEnd().endsWith(",")) return false;
    this.last.instructor = `${this.last.instructor.trim()} ${text}`;
    this.merged += 1;
    return true;
  }

  accept(row: T): void {
    this.last = row;
  }
}
