import { NameResolutionError } from "@/errors";
import objectsJson from "~/data/objects.json";
import { z } from "zod";

export const RawKinds = ["number", "bytes", "structured", "string"] as const;
export type RawKind = (typeof RawKinds)[number];

export const ObjectDescriptorSchema = z.object({
  objectId: z.number().int(),
  name: z.string(),
  unit: z.string().optional(),
  rawKind: z.enum(RawKinds),
});

export type ObjectDescriptor = Readonly<z.infer<typeof ObjectDescriptorSchema>>;

export interface ObjectRegistry {
  /**
   * オブジェクト名から定義を取得します。
   *
   * @throws {NameResolutionError} 登録されていない名前の場合
   */
  getByName(name: string): ObjectDescriptor;

  getById(objectId: number): ObjectDescriptor | undefined;
}

export function isObjectDescriptor(value: unknown): value is ObjectDescriptor {
  return ObjectDescriptorSchema.safeParse(value).success;
}

export function parseObjectDescriptors(value: unknown): ObjectDescriptor[] {
  const validationResult = z.array(ObjectDescriptorSchema).safeParse(value);

  if (!validationResult.success) {
    const [index] = validationResult.error.issues[0]?.path ?? [];
    throw new Error(
      typeof index === "number"
        ? `Invalid object registry entry at index ${index}`
        : "Invalid object registry: not an array",
    );
  }

  return validationResult.data.map((descriptor) => Object.freeze(descriptor));
}

export function createObjectRegistry(
  descriptors: readonly ObjectDescriptor[],
): ObjectRegistry {
  const byName = new Map<string, ObjectDescriptor>();
  const byId = new Map<number, ObjectDescriptor>();

  for (const descriptor of descriptors) {
    if (byName.has(descriptor.name) || byId.has(descriptor.objectId)) {
      throw new Error(
        `Duplicate object registry entry: ${descriptor.name} (0x${descriptor.objectId.toString(16)})`,
      );
    }
    byName.set(descriptor.name, descriptor);
    byId.set(descriptor.objectId, descriptor);
  }

  return {
    getByName: (name) => {
      const descriptor = byName.get(name);
      if (!descriptor) {
        throw new NameResolutionError(name);
      }
      return descriptor;
    },
    getById: (objectId) => byId.get(objectId),
  };
}

/**
 * 同梱のオブジェクト定義からレジストリを作成します
 */
export function loadDefaultObjectRegistry(): ObjectRegistry {
  return createObjectRegistry(parseObjectDescriptors(objectsJson));
}
