export type KernelProfile = {
  /** Jupyter kernel name passed to `jupyter console --kernel`. */
  kernel: string;
  label: string;
  fence: string;
  /** The console indents continuation lines itself, so typed code must not. */
  autoIndent: boolean;
  indentWidth: number;
  notes: string[];
  errorPatterns: RegExp[];
};

type ProfileTemplate = Omit<KernelProfile, 'kernel'> & { matches: (kernel: string) => boolean };

const TEMPLATES: ProfileTemplate[] = [
  {
    matches: (k) => k.includes('python'),
    label: 'Python',
    fence: 'python',
    autoIndent: true,
    indentWidth: 4,
    notes: [
      'Keep every snippet fast to run, well under five minutes. When teaching model training, train for a single epoch.'
    ],
    errorPatterns: [/Traceback \(most recent call last\)/, /^\s*\w+(Error|Exception): /m]
  },
  {
    matches: (k) => k.includes('cpp'),
    label: 'C++',
    fence: 'cpp',
    autoIndent: false,
    indentWidth: 4,
    notes: [
      'Code runs in the Cling interpreter; use Cling pragmas such as #pragma cling add_include_path("dir") or #pragma cling load("lib") when needed.',
      'Include headers with quotes instead of angle brackets.'
    ],
    errorPatterns: [/input_line_\d+:\d+:\d+: error:/, /^\s*error: /m]
  },
  {
    matches: (k) => k === 'ir' || k === 'r',
    label: 'R',
    fence: 'r',
    autoIndent: false,
    indentWidth: 2,
    notes: [],
    errorPatterns: [/^Error in /m, /^Error: /m]
  },
  {
    matches: (k) => k.includes('julia'),
    label: 'Julia',
    fence: 'julia',
    autoIndent: false,
    indentWidth: 4,
    notes: [],
    errorPatterns: [/^ERROR: /m]
  },
  {
    matches: (k) => k.includes('rust'),
    label: 'Rust',
    fence: 'rust',
    autoIndent: false,
    indentWidth: 4,
    notes: ['Code runs in the Evcxr kernel; keep top-level statements compatible with it.'],
    errorPatterns: [/^error(\[E\d+\])?: /m]
  },
  {
    matches: (k) => k.includes('bash'),
    label: 'Bash',
    fence: 'bash',
    autoIndent: false,
    indentWidth: 2,
    notes: [],
    errorPatterns: [/: command not found/, /: line \d+: /]
  }
];

export function resolveKernelProfile(kernel: string): KernelProfile {
  const name = kernel.trim().toLowerCase();
  const template = TEMPLATES.find((t) => t.matches(name));
  if (!template) {
    return {
      kernel,
      label: kernel,
      fence: name,
      autoIndent: false,
      indentWidth: 4,
      notes: [],
      errorPatterns: []
    };
  }
  const { matches: _matches, ...profile } = template;
  return { kernel, ...profile };
}
