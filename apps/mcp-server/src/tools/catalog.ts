import type { JobTool } from './types.js';
import { listJobCategoriesTool } from './list-job-categories.js';
import { searchCompanyJobsTool } from './search-company-jobs.js';
import { searchInternshipsTool } from './search-internships.js';
import { searchJobsTool } from './search-jobs.js';
import { searchRemoteJobsTool } from './search-remote-jobs.js';

const allTools: JobTool[] = [
  searchJobsTool,
  searchCompanyJobsTool,
  searchRemoteJobsTool,
  searchInternshipsTool,
  listJobCategoriesTool,
];

function assertUniqueNames(tools: JobTool[]): void {
  const seen = new Set<string>();

  for (const tool of tools) {
    if (seen.has(tool.name)) {
      throw new Error(`Duplicate tool name: ${tool.name}`);
    }

    seen.add(tool.name);
  }
}

assertUniqueNames(allTools);

export function getAllTools(): JobTool[] {
  return [...allTools];
}
