// __fixtures__/blog.ts
import {
   belongsTo,
   belongsToMany,
   defineCast,
   defineModel,
   defineValueObject,
   hasMany,
   hasOne,
   morphTo,
   type ModelDefinition,
} from "@/schema/definitions";

export const AddressData = defineValueObject({
   name: "AddressData",
   params: [
      { name: "street", type: "string" },
      { name: "city", type: "string" },
      { name: "state", type: "?string", default: null },
      { name: "zipCode", type: "string", default: "" },
   ],
});

export const TagData = defineValueObject({
   name: "TagData",
   params: [
      { name: "label", type: "string" },
      { name: "color", type: "?string" },
   ],
});

export const MetadataData = defineValueObject({
   name: "MetadataData",
   doc: `/**
 * @param array<string, mixed> $extra Free-form values
 * @param AddressData|null $address
 * @param array<int, TagData> $tags
 */`,
   params: [
      { name: "extra", type: "array" },
      { name: "address", type: "?AddressData" },
      { name: "tags", type: "array", default: [] },
   ],
});

export const JsonLdData = defineValueObject({
   name: "JsonLdData",
   params: [{ name: "payload", type: "array" }],
});

export const AddressCast = defineCast({
   name: "AddressCast",
   get: { returns: AddressData, nullable: true },
});

export const MetadataCast = defineCast({
   name: "MetadataCast",
   get: { returns: "?MetadataData" },
});

export const TagsCast = defineCast({
   name: "TagsCast",
   get: { returns: "array", doc: "/** @return array<int, TagData> */" },
});

export const JsonLdCast = defineCast({
   name: "JsonLdCast",
   get: { returns: () => JsonLdData, nullable: true },
});

export const Role = defineModel({
   name: "Role",
   fillable: ["name", "description"],
});

export const RoleUser = defineModel({
   name: "RoleUser",
   fillable: ["granted_by", "expires_at"],
});

export const Comment: ModelDefinition = defineModel({
   name: "Comment",
   fillable: ["body"],
   timestamps: false,
   relations: {
      post: belongsTo(() => Post),
      commentable: morphTo(),
   },
});

export const Post: ModelDefinition = defineModel({
   name: "Post",
   fillable: ["user_id", "title", "body", "published_at"],
   casts: { user_id: "integer", published_at: "datetime" },
   relations: {
      author: belongsTo(() => User),
      comments: hasMany(() => Comment),
   },
});

export const User: ModelDefinition = defineModel({
   name: "User",
   fillable: ["name", "email", "is_admin", "address", "metadata", "tags", "description"],
   casts: {
      is_admin: "boolean",
      address: AddressCast,
      metadata: MetadataCast,
      tags: TagsCast,
   },
   relations: {
      posts: hasMany(() => Post),
      roles: belongsToMany(() => Role, { pivot: { columns: ["granted_at"] } }),
      latestPost: hasOne(() => Post),
   },
});

export const Page = defineModel({
   name: "Page",
   fillable: ["title", "schema"],
   casts: { schema: JsonLdCast },
   timestamps: false,
});
