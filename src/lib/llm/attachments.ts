// lib/llm/attachments.ts

import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { FileNotFoundError, UnreadableFileError } from './errors';
import type { MultimodalRequest } from './types';

/**
 * 按扩展名识别本地文件类型，只收录上游视觉模型能接受的图片格式和纯文本格式。
 */
const IMAGE_MIME_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.bmp': 'image/bmp',
};

const TEXT_MIME_TYPES: Record<string, string> = {
  '.txt': 'text/plain',
  '.log': 'text/plain',
  '.md': 'text/markdown',
  '.csv': 'text/csv',
  '.html': 'text/html',
  '.htm': 'text/html',
  '.xml': 'text/xml',
  '.json': 'application/json',
  '.yaml': 'text/yaml',
  '.yml': 'text/yaml',
};

export interface ImageAttachment {
  kind: 'image';
  url: string; // 远程 URL 或 data URL
  source: 'remote' | 'local';
  mimeType?: string; // 远程图片不做探测
  path?: string;
}

export interface TextAttachment {
  kind: 'text';
  filename: string;
  text: string;
}

export interface LoadedAttachments {
  images: ImageAttachment[];
  textFiles: TextAttachment[];
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * 把文件系统错误映射为附件错误。
 */
function toAttachmentError(filePath: string, error: unknown): FileNotFoundError | UnreadableFileError {
  if (isErrnoException(error)) {
    switch (error.code) {
      case 'ENOENT':
      case 'ENOTDIR':
        return new FileNotFoundError(filePath, error);
      case 'EACCES':
      case 'EPERM':
        return new UnreadableFileError(filePath, 'permission denied', error);
      case 'EISDIR':
        return new UnreadableFileError(filePath, 'path is a directory', error);
    }
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new UnreadableFileError(filePath, reason, error);
}

export function toDataUrl(mimeType: string, data: Buffer): string {
  return `data:${mimeType};base64,${data.toString('base64')}`;
}

export function formatTextFile(filename: string, text: string): string {
  return `File: ${filename}\n${text}`;
}

async function loadLocalFile(filePath: string): Promise<ImageAttachment | TextAttachment> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(filePath)).isDirectory();
  } catch (error) {
    throw toAttachmentError(filePath, error);
  }
  if (isDirectory) {
    throw new UnreadableFileError(filePath, 'path is a directory');
  }

  const ext = path.extname(filePath).toLowerCase();
  const imageMime = IMAGE_MIME_TYPES[ext];
  const textMime = TEXT_MIME_TYPES[ext];
  if (!imageMime && !textMime) {
    throw new UnreadableFileError(filePath, `unsupported file type '${ext || '(none)'}'`);
  }

  let data: Buffer;
  try {
    data = await readFile(filePath);
  } catch (error) {
    throw toAttachmentError(filePath, error);
  }

  if (imageMime) {
    return { kind: 'image', url: toDataUrl(imageMime, data), source: 'local', mimeType: imageMime, path: filePath };
  }
  return { kind: 'text', filename: path.basename(filePath), text: data.toString('utf8') };
}

/**
 * 解析请求中的全部附件。
 * 远程图片只做透传；本地文件在这里读取，缺失或不可读时直接抛错，此时还没有发起任何网络请求。
 * 本地图片转成 base64 data URL，文本文件按 "File: 文件名" 的格式内联。
 */
export async function loadAttachments(request: Pick<MultimodalRequest, 'imageUrls' | 'filePaths'>): Promise<LoadedAttachments> {
  const images: ImageAttachment[] = request.imageUrls.map(url => ({ kind: 'image', url, source: 'remote' }));
  const textFiles: TextAttachment[] = [];

  // 按顺序读取，保证报错的是第一个有问题的文件
  for (const filePath of request.filePaths) {
    const attachment = await loadLocalFile(filePath);
    if (attachment.kind === 'image') {
      images.push(attachment);
    } else {
      textFiles.push(attachment);
    }
  }

  return { images, textFiles };
}
