import {
  AggregateBucket,
  AggregateSpec,
  FindOptions,
  NewResource,
  Resource,
  ResourceFields,
  ResourceFilter,
  UpdateResult
} from "../types/contracts.js";

/**
 * Access to inventory records. Implementations throw `StoreUnavailableError`
 * when the backing storage cannot be reached; a filter that matches nothing
 * is never an error.
 */
export interface ResourceStore {
  init(): Promise<void>;

  find(filter: ResourceFilter, opts?: FindOptions): Promise<Resource[]>;
  insert(input: NewResource): Promise<Resource>;
  updateMany(filter: ResourceFilter, fields: ResourceFields): Promise<UpdateResult>;
  deleteMany(filter: ResourceFilter): Promise<number>;
  aggregate(agg: AggregateSpec): Promise<AggregateBucket[]>;

  close(): Promise<void>;
}
