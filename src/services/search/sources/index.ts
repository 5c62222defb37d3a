// Source adapters and the startup registry builder

import { loadEngineDefinitions, type EngineDefinition } from '../../../config/engines';
import { SourceRegistry } from '../SourceRegistry';
import { EpornerSource } from './EpornerSource';
import { GenericHtmlSource } from './GenericHtmlSource';
import { PornHubSource } from './PornHubSource';
import { XHamsterSource } from './XHamsterSource';
import { XVideosSource } from './XVideosSource';

export { EpornerSource, GenericHtmlSource, PornHubSource, XHamsterSource, XVideosSource };

export function createSourceRegistry(definitions: EngineDefinition[] = loadEngineDefinitions()): SourceRegistry {
    return new SourceRegistry([
        new PornHubSource(),
        new XVideosSource(),
        new XHamsterSource(),
        new EpornerSource(),
        ...definitions.map(definition => new GenericHtmlSource(definition)),
    ]);
}
