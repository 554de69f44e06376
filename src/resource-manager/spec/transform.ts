import { ClassConstructor, plainToInstance, TransformFnParams } from 'class-transformer';

export const transformObject = <T>(cls: ClassConstructor<T>): (params: TransformFnParams) => unknown => {
  return ({ value }) => {
    if (!(value instanceof Object) || Array.isArray(value)) {
      return value;
    }
    const res: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      res[k] = v instanceof Object && !Array.isArray(v) ? plainToInstance(cls, v) : v;
    }
    return res;
  };
};
