export interface CommandTemplate {
  label: string;
  command: string;
}

export interface TemplateGroup {
  category: string;
  templates: CommandTemplate[];
}

export const COMMAND_TEMPLATES: readonly TemplateGroup[] = [
  {
    category: 'Files & Folders',
    templates: [
      { label: 'List files', command: 'ls -la' },
      { label: 'Find large files', command: 'find . -type f -size +10M' },
      { label: 'Count files', command: 'find . -type f | wc -l' },
      { label: 'Show tree structure', command: 'tree -L 2' },
      { label: 'Recent files', command: 'find . -type f -mtime -1' },
    ],
  },
  {
    category: 'System Info',
    templates: [
      { label: 'Disk usage', command: 'df -h' },
      { label: 'Memory info', command: 'free -h' },
      { label: 'CPU info', command: 'lscpu' },
      { label: 'Network info', command: 'ip addr' },
      { label: 'Running processes', command: 'ps aux | head -20' },
    ],
  },
  {
    category: 'Search & Filter',
    templates: [
      { label: 'Find TypeScript files', command: "find . -name '*.ts'" },
      { label: 'Search in files', command: "grep -rn 'TODO' ." },
      { label: 'List directories only', command: 'find . -maxdepth 1 -type d' },
    ],
  },
  {
    category: 'Text Processing',
    templates: [
      { label: 'Count lines', command: 'wc -l *.txt' },
      { label: 'Sort files by size', command: 'ls -lhS' },
    ],
  },
];
