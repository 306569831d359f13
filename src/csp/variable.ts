/**
 * A named problem variable. Two variables are equal only if they are the
 * same object; the name is for display.
 */
export class Variable {
    constructor(public readonly name: string) { }

    toString(): string {
        return this.name;
    }
}

export function createVariables(...names: string[]): Variable[] {
    return names.map(name => new Variable(name));
}
