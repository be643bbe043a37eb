import _ from 'lodash'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

const viewsDir = new URL('../views/', import.meta.url)

const compiled = new Map<string, _.TemplateExecutor>()

const getTemplate = (name: string) => {
    let template = compiled.get(name)
    if (!template) {
        const source = readFileSync(
            fileURLToPath(new URL(`${name}.html`, viewsDir)),
            'utf8'
        )
        template = _.template(source)
        compiled.set(name, template)
    }
    return template
}

export const renderView = (name: string, data: object = {}) =>
    getTemplate(name)(data)

/** JSON safe to drop inside a <script> element. */
export const toScriptJson = (value: unknown) =>
    JSON.stringify(value)
        .replace(/</g, '\\u003c')
        .replace(/>/g, '\\u003e')
        .replace(/&/g, '\\u0026')
