import fs from 'fs';
import path from 'path';
import { getRuntimeConfig, LOG_LEVELS, LogLevel } from '../config/runtimeConfig';

export interface LogRecord {
  ts: string; // ISO timestamp
  level: LogLevel;
  evt: string; // short event key, e.g. 'scan:skip'
  msg?: string;
  ms?: number;
  data?: unknown;
}

let logFileHandle: fs.WriteStream | null = null;
let logFilePath: string | undefined;

function loggingCfg(){
  return getRuntimeConfig().logging;
}

function levelEnabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(loggingCfg().level);
}

// Lazily opened append stream; reopened if CATALOG_LOG_FILE changes after a config reload.
function fileStream(): fs.WriteStream | null {
  const file = loggingCfg().file;
  if(!file) return null;
  if(logFileHandle && logFilePath === file && !logFileHandle.destroyed) return logFileHandle;
  if(logFileHandle && !logFileHandle.destroyed) logFileHandle.end();
  logFileHandle = null;
  logFilePath = undefined;
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    const stream = fs.createWriteStream(file, { flags: 'a', encoding: 'utf8' });
    stream.on('error', err => {
      console.error(`[logger] log file stream error (${file}): ${err.message}`);
      if(logFileHandle === stream) logFileHandle = null;
    });
    logFileHandle = stream;
    logFilePath = file;
  } catch (error) {
    console.error(`[logger] Failed to initialize file logging to ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return logFileHandle;
}

/** Flush and close the log file, if one is open. The next record reopens it. */
export function closeLogFile(): Promise<void> {
  const stream = logFileHandle;
  logFileHandle = null;
  logFilePath = undefined;
  if(!stream || stream.destroyed) return Promise.resolve();
  return new Promise(resolve => { stream.end(() => resolve()); });
}

export function formatRecord(rec: LogRecord, json: boolean): string {
  if(json) return JSON.stringify(rec);
  const parts = [rec.ts, rec.level.toUpperCase(), rec.evt, rec.msg||''];
  if(rec.ms !== undefined) parts.push(`${rec.ms}ms`);
  if(rec.data !== undefined) parts.push(JSON.stringify(rec.data));
  return parts.filter(Boolean).join(' ');
}

function emit(rec: LogRecord){
  const line = formatRecord(rec, loggingCfg().json);
  // stderr keeps stdout free for callers that print catalog results
  console.error(line);
  const stream = fileStream();
  if(stream) stream.write(line + '\n');
}

export function log(level: LogLevel, evt: string, fields: Omit<LogRecord,'level'|'evt'|'ts'> = {}){
  if(!levelEnabled(level)) return;
  emit({ ts: new Date().toISOString(), level, evt, ...fields });
}

export const logDebug = (evt:string, f?:unknown)=> log('debug', evt, { data:f });
export const logInfo = (evt:string, f?:unknown)=> log('info', evt, { data:f });
export const logWarn = (evt:string, f?:unknown)=> log('warn', evt, { data:f });
export const logError = (evt:string, f?:unknown)=> log('error', evt, { data:f });
