// Commands
export enum KVCommand {
  GET = 'GET',
  SET = 'SET',
  DELETE = 'DELETE',
  FLUSH = 'FLUSH',
  MGET = 'MGET',
  MSET = 'MSET',
  PING = 'PING',
  ECHO = 'ECHO',
  KEYS = 'KEYS',
}

// RESP Protocol Types
export enum RESPType {
  String = '+',
  Error = '-',
  Integer = ':',
  Bulk = '$',
  Array = '*',
  Map = '%',
}

export interface SimpleStringValue {
  type: RESPType.String;
  value: Buffer;
}

export interface ErrorValue {
  type: RESPType.Error;
  message: string;
}

export interface IntegerValue {
  type: RESPType.Integer;
  value: number;
}

export interface BulkStringValue {
  type: RESPType.Bulk;
  value: Buffer | null;
}

export interface ArrayValue {
  type: RESPType.Array;
  value: RESPValue[];
}

export interface MapValue {
  type: RESPType.Map;
  value: [RESPValue, RESPValue][];
}

export type RESPValue =
  | SimpleStringValue
  | ErrorValue
  | IntegerValue
  | BulkStringValue
  | ArrayValue
  | MapValue;

// Configuration
export interface Config {
  host: string;
  port: number;
  maxClients: number;
}

// Constants
export const DEFAULT_PORT = 31337;
export const LOCALHOST = '127.0.0.1';
export const DEFAULT_MAX_CLIENTS = 64;
export const CRLF = '\r\n';
