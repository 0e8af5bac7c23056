/**
 * Target path construction for downloaded files
 *
 * Layout: {baseDir}/{sanitizedTitle}/{filename}, sidecar at {filename}.md5
 */

import { extname, isAbsolute, join, resolve } from "node:path"
import type { DownloadDescriptor, GameEntry } from "./types.js"

export const CHECKSUM_EXTENSION = ".md5"

/**
 * Replace everything outside [A-Za-z0-9._-] with "_" and collapse runs
 * @example sanitizeTitle("The Witcher 3: Wild Hunt") // "The_Witcher_3_Wild_Hunt"
 */
export function sanitizeTitle(title: string): string {
	return title.replace(/[^a-zA-Z0-9._-]/g, "_").replace(/_{2,}/g, "_")
}

/**
 * Resolve the base directory against the working directory when relative
 */
export function resolveBaseDirectory(
	directory: string,
	cwd: string = process.cwd(),
): string {
	return isAbsolute(directory) ? directory : resolve(cwd, directory)
}

export function gameDirectory(baseDir: string, game: GameEntry): string {
	return join(baseDir, sanitizeTitle(game.title))
}

/**
 * File name of a download: the last segment of its URL path, decoded.
 * Falls back to the sanitized descriptor name when the URL has none.
 */
export function downloadFilename(descriptor: DownloadDescriptor): string {
	let segment = ""
	try {
		const { pathname } = new URL(descriptor.url)
		segment = pathname.slice(pathname.lastIndexOf("/") + 1)
		segment = decodeURIComponent(segment)
	} catch {
		segment = ""
	}

	// Never let a decoded segment climb out of the game directory
	if (!segment || segment === "." || segment === ".." || /[/\\]/.test(segment)) {
		return sanitizeTitle(descriptor.name)
	}
	return segment
}

/**
 * Target path for a download, distinct from every path already in `claimed`.
 * A taken name gets the language and platform before its extension, then a
 * counter. The returned path is added to `claimed`.
 * @example "setup.exe" taken -> "setup_Czech_windows.exe"
 */
export function claimTargetPath(
	targetDir: string,
	descriptor: DownloadDescriptor,
	claimed: Set<string>,
): string {
	const filename = downloadFilename(descriptor)
	let candidate = join(targetDir, filename)

	if (claimed.has(candidate)) {
		const extension = extname(filename)
		const stem = filename.slice(0, filename.length - extension.length)
		const tag = sanitizeTitle(`${descriptor.language}_${descriptor.platform}`)
		candidate = join(targetDir, `${stem}_${tag}${extension}`)
		for (let n = 2; claimed.has(candidate); n++) {
			candidate = join(targetDir, `${stem}_${tag}_${n}${extension}`)
		}
	}

	claimed.add(candidate)
	return candidate
}

export function checksumPath(targetPath: string): string {
	return `${targetPath}${CHECKSUM_EXTENSION}`
}
