// Dependency injection types
export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>

export type ExitFn = (code: number) => never

export interface FsModule {
	readFile(path: string, encoding: 'utf-8'): Promise<string>
}

export interface Output {
	log(message: string): void
	error(message: string): void
}
