export interface Choice<T> {
  name: string;
  value: T;
}

/** Asks the user to pick one of the choices. */
export type Chooser = <T>(message: string, choices: Choice<T>[]) => Promise<T>;
