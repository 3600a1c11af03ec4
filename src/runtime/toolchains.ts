import * as path from 'path';
import { Language } from './languages';

export interface Command {
  command: string;
  args: string[];
}

/**
 * How one guest language is probed, has its dependencies installed,
 * and is compiled and run. Paths handed to compile/run are absolute.
 */
export interface Toolchain {
  language: Language;
  probe: Command;
  /** Absent for languages with no package manager step. */
  install?: (dependency: string) => Command;
  sourceFile(code: string): string;
  compile?: (dir: string, source: string) => Command;
  run(dir: string, source: string): Command;
}

/** Name of the first class declared in a Java snippet, `Main` when none is found. */
export function javaClassName(code: string): string {
  const line = code.split('\n').find(l => l.includes('class'));
  const match = line?.match(/\bclass\s+([A-Za-z_$][\w$]*)/);
  return match ? match[1] : 'Main';
}

const cmd = (command: string, ...args: string[]): Command => ({ command, args });

export const TOOLCHAINS: Record<Language, Toolchain> = {
  python: {
    language: 'python',
    probe: cmd('python3', '--version'),
    install: dep => cmd('pip3', 'install', dep),
    sourceFile: () => 'main.py',
    run: (_dir, source) => cmd('python3', source),
  },
  javascript: {
    language: 'javascript',
    probe: cmd('node', '--version'),
    install: dep => cmd('npm', 'install', dep),
    sourceFile: () => 'main.js',
    run: (_dir, source) => cmd('node', source),
  },
  go: {
    language: 'go',
    probe: cmd('go', 'version'),
    sourceFile: () => 'main.go',
    run: (_dir, source) => cmd('go', 'run', source),
  },
  cpp: {
    language: 'cpp',
    probe: cmd('g++', '--version'),
    sourceFile: () => 'main.cpp',
    compile: (dir, source) => cmd('g++', source, '-o', path.join(dir, 'main')),
    run: dir => cmd(path.join(dir, 'main')),
  },
  java: {
    language: 'java',
    probe: cmd('java', '-version'),
    install: dep => cmd('mvn', `dependency:get`, `-Dartifact=${dep}`),
    sourceFile: code => `${javaClassName(code)}.java`,
    compile: (_dir, source) => cmd('javac', source),
    run: (dir, source) => cmd('java', '-cp', dir, path.basename(source, '.java')),
  },
  php: {
    language: 'php',
    probe: cmd('php', '--version'),
    sourceFile: () => 'main.php',
    run: (_dir, source) => cmd('php', source),
  },
  rust: {
    language: 'rust',
    probe: cmd('rustc', '--version'),
    sourceFile: () => 'main.rs',
    compile: (dir, source) => cmd('rustc', source, '-o', path.join(dir, 'main')),
    run: dir => cmd(path.join(dir, 'main')),
  },
};
