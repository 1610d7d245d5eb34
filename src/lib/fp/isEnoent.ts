/** True for the error fs raises when a path does not exist. */
const isEnoent = (e: unknown): e is NodeJS.ErrnoException =>
  e instanceof Error && "code" in e && e.code === "ENOENT";

export default isEnoent;
