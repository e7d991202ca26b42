export type IO = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

export function defaultIO(): IO {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  };
}
