import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeAll, beforeEach, afterEach } from '@jest/globals';
import { ExpConfigError, parseConfigurationDocument, setLogLevel } from '@expflow/experiment-config';
import { renderCommand, resolveCommand, sourceCommand } from '../src/commands.js';

describe('expflow commands', () => {
    let dir: string;
    let confDir: string;

    beforeAll(() => {
        setLogLevel('silent');
    });

    beforeEach(() => {
        dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'expflow-cli-')));
        confDir = path.join(dir, 'conf');
        fs.mkdirSync(confDir);
        fs.writeFileSync(path.join(confDir, '10-base.yml'), 'name: demo\nwallclock: "01:00"\n');
        fs.writeFileSync(path.join(confDir, '20-site.yml'), 'wallclock: "02:00"\nlabel: "%^name%"\n');
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should print the resolved configuration', () => {
        const document: unknown = JSON.parse(resolveCommand(confDir, { format: 'json' }));

        expect(document).toMatchObject({ name: 'demo', wallclock: '02:00', label: 'demo' });
    });

    it('should write the document and the provenance to files', () => {
        const output = path.join(dir, 'resolved.yml');
        const provenanceJson = path.join(dir, 'provenance.json');
        resolveCommand(confDir, { output, provenanceJson });

        const restored = parseConfigurationDocument(fs.readFileSync(output, 'utf8'), output);
        expect(restored.get('wallclock')).toBe('02:00');
        const provenance: unknown = JSON.parse(fs.readFileSync(provenanceJson, 'utf8'));
        expect(provenance).toMatchObject({
            wallclock: { source: path.join(confDir, '20-site.yml'), kind: 'direct', line: 1, col: 1 }
        });
    });

    it('should show where a key came from', () => {
        expect(sourceCommand(confDir, 'label'))
            .toBe(`label: ${path.join(confDir, '20-site.yml')}:2:1 (deferred-placeholder)`);
        expect(() => sourceCommand(confDir, 'missing')).toThrow(ExpConfigError);
    });

    it('should render a job script into the output directory', () => {
        const template = path.join(dir, 'sim.sh');
        fs.writeFileSync(template, 'echo %name% %wallclock%\n');
        const outDir = path.join(dir, 'out');

        const result = renderCommand(template, { config: confDir, job: 'SIM', outDir, projectRoot: dir });

        expect(result.file).toBe(path.join(outDir, 'sim.cmd'));
        expect(fs.readFileSync(result.file, 'utf8')).toBe(result.text);
        expect(result.text).toContain('\necho demo 02:00\n');
    });
});
