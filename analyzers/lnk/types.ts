"use strict";

export type LnkTargetType = "file" | "directory" | "any";

export type LnkTargetKind = Exclude<LnkTargetType, "any">;

export interface LnkHeaderFields {
  linkFlags: number;
  fileAttributes: number;
  linksToDirectory: boolean;
}

export interface LnkLinkInfoLocation {
  hasIdList: boolean;
  // Bytes taken by the ID list including its size field; 0 when absent.
  idListLength: number;
  offset: number;
}

export interface LnkTargetStrings {
  headerSize: number;
  isUnicode: boolean;
  basePath: string;
  pathSuffix: string;
}

export interface LnkTargetInfo {
  linkFlags: number;
  fileAttributes: number;
  linksToDirectory: boolean;
  hasIdList: boolean;
  idListLength: number;
  linkInfoOffset: number;
  linkInfoHeaderSize: number;
  isUnicode: boolean;
  basePath: string;
  pathSuffix: string;
  path: string;
}
