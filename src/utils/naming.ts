/**
 * "UserAPI" -> "user_api", "HelloWorld" -> "hello_world". Runs of capitals
 * stay together.
 */
export function camelToSnake(name: string): string {
  return name
    .replace(/(?<=[a-z0-9])(?=[A-Z])/g, "_")
    .replace(/(?<=[A-Z])(?=[A-Z][a-z])/g, "_")
    .toLowerCase();
}

/** "say_hello" -> "SayHello", "sayHello" -> "SayHello". */
export function toPascalCase(name: string): string {
  return name
    .split(/[_\-\s]+/)
    .filter(Boolean)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}

/** Valid proto package segment derived from a file stem: "hello-world" -> "hello_world". */
export function toPackageName(stem: string): string {
  const cleaned = stem.replace(/[^A-Za-z0-9_.]/g, "_");
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}
