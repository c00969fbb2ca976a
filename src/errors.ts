/**
 * レジストリに登録されていないオブジェクト名を参照した
 */
export class NameResolutionError extends Error {
  public readonly objectName: string;

  constructor(objectName: string) {
    super(`Unknown object name: "${objectName}"`);
    this.name = "NameResolutionError";
    this.objectName = objectName;
  }
}
