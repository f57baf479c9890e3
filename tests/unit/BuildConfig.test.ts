import fs from 'fs';
import path from 'path';

function readJson(fileName: string): unknown {
    return JSON.parse(fs.readFileSync(path.join(__dirname, '../..', fileName), 'utf8'));
}

describe('Build configuration', () => {
    it('should compile sources without test runner globals', () => {
        expect(readJson('tsconfig.build.json')).toMatchObject({
            extends: './tsconfig.json',
            compilerOptions: { rootDir: 'src', outDir: 'dist', types: ['node'] },
            include: ['src/**/*.ts']
        });
    });

    it('should point the package entry points at the build output', () => {
        expect(readJson('package.json')).toMatchObject({
            main: 'dist/index.js',
            types: 'dist/index.d.ts',
            bin: {
                'media-tts': 'dist/cli/tts.js',
                'media-video': 'dist/cli/video.js',
                'media-avatar': 'dist/cli/avatar.js'
            },
            scripts: {
                build: 'tsc -p tsconfig.build.json',
                typecheck: 'tsc --noEmit && tsc -p tsconfig.build.json --noEmit'
            }
        });
    });
});
