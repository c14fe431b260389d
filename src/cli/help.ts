export function printVersion(version: string): void {
  console.log(`taskreview ${version}`);
}
