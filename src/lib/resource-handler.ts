import type ActiveRecord from './active-record.js';
import type { Row } from './connection-types.js';
import { isRow } from './connection-types.js';
import { DocumentNotFound, ValidationError } from './errors.js';
import type { CurrentRequest } from './request.js';

export type RecordOpener = () => Promise<ActiveRecord>;

export type ResourceResult = Row | Row[] | { deleted: boolean };

export type ResourceHandler = (request: CurrentRequest) => Promise<ResourceResult>;

const readBody = (request: CurrentRequest): Row => {
  if (!isRow(request.body)) {
    throw new ValidationError('Request body must be a JSON object', 'body');
  }
  return request.body;
};

const loadOrFail = async (record: ActiveRecord, id: string): Promise<ActiveRecord> => {
  const found = await record.findById(id);
  if (!found) {
    throw new DocumentNotFound(`${record.getTable()} with id ${id} not found`);
  }
  return found;
};

/**
 * Map REST-style requests on one table onto record operations.
 *
 * `segments[0]`, when present, is the primary key. Query parameters on a
 * collection GET become equality conditions; names that are not columns are
 * ignored. Results are plain maps for the dispatcher to serialize.
 *
 * @param open - Opens a fresh record for the table on every request
 */
export function createResourceHandler(open: RecordOpener): ResourceHandler {
  return async request => {
    const record = await open();
    const [id] = request.segments;
    const method = request.method.toUpperCase();

    if (id === undefined || id === '') {
      switch (method) {
        case 'GET': {
          const conditions = Object.fromEntries(
            Object.entries(request.query).filter(([field]) => record.schema.hasField(field))
          );
          const found = await record.findAll(conditions);
          return found.map(item => item.toMap());
        }
        case 'POST': {
          await record.fill(readBody(request)).save();
          return record.toMap();
        }
        default:
          throw new ValidationError(`Method ${method} requires a record id`, 'method');
      }
    }

    switch (method) {
      case 'GET':
        return (await loadOrFail(record, id)).toMap();
      case 'PUT':
      case 'PATCH': {
        // The id comes from the path; a body id must not redirect the update.
        const body = Object.fromEntries(
          Object.entries(readBody(request)).filter(([field]) => field !== record.getPrimaryKey())
        );
        const found = await loadOrFail(record, id);
        await found.fill(body).save();
        return found.toMap();
      }
      case 'DELETE': {
        const found = await loadOrFail(record, id);
        return { deleted: await found.delete() };
      }
      default:
        throw new ValidationError(`Method ${method} is not supported`, 'method');
    }
  };
}

export default createResourceHandler;
