export type ExecutionRequest = {
  jobId: string;
  listingRef: string;
  profileRef: string;
  profileDisplayName: string;
  profileFolderPath: string;
  location: string;
};

export type ExecutionResult = {
  success: boolean;
  errorMessage?: string;
};

/**
 * Performs the actual marketplace post. Calls can take minutes; the caller bounds them
 * with a timeout and aborts `signal` when it fires.
 */
export interface ExecutionAgent {
  execute(request: ExecutionRequest, signal?: AbortSignal): Promise<ExecutionResult>;
}
