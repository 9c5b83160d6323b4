export interface Segment {
  number: number; // 1-based position in the job
  filename: string; // e.g. "reel_01.mp4"
  start: number; // seconds
  end: number; // seconds
  duration: number; // seconds
  sizeMb: number; // rounded to 2 decimals
}
