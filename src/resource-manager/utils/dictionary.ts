export interface Dictionary<T> {
  [key: string]: T;
}
