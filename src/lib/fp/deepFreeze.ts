export type ReadonlyDeep<T> = {
  readonly [P in keyof T]: ReadonlyDeep<T[P]>;
};

const freezeAll = (object: object, seen: WeakSet<object>) => {
  seen.add(object);

  // Freeze properties before freezing self
  for (const name of Reflect.ownKeys(object)) {
    const value: unknown = Reflect.get(object, name);
    if (value && typeof value === "object" && !seen.has(value)) {
      freezeAll(value, seen);
    }
  }

  Object.freeze(object);
};

function deepFreeze<T extends object>(object: T): ReadonlyDeep<T>;
function deepFreeze(object: object): object {
  freezeAll(object, new WeakSet());
  return object;
}

export default deepFreeze;
