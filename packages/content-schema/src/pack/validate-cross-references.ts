import { z } from 'zod';

import type { ContentSchemaWarning } from '../errors.js';
import type { ParsedContentPack } from './schema.js';

type IssuePath = readonly (string | number)[];

const addMissingReference = (
  ctx: z.RefinementCtx,
  path: IssuePath,
  message: string,
) => {
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    path: [...path],
    message,
  });
};

/**
 * Verifies that every id a definition points at exists in the pack, and
 * reports soft authoring problems (single-member exclusive groups, upgrades
 * dated before a direct prerequisite) to the warning sink.
 */
export const validateCrossReferences = (
  pack: ParsedContentPack,
  ctx: z.RefinementCtx,
  warningSink: (warning: ContentSchemaWarning) => void,
): void => {
  const resourceIds = new Set<string>(pack.resources.map((resource) => resource.id));
  const treeIds = new Set<string>(pack.trees.map((tree) => tree.id));
  const upgradesById = new Map<string, ParsedContentPack['upgrades'][number]>(pack.upgrades.map((upgrade) => [upgrade.id, upgrade]));

  const ensureResource = (id: string, path: IssuePath) => {
    if (!resourceIds.has(id)) {
      addMissingReference(ctx, path, `Resource "${id}" is not defined in this pack.`);
    }
  };

  const ensureUpgrade = (id: string, path: IssuePath) => {
    if (!upgradesById.has(id)) {
      addMissingReference(ctx, path, `Upgrade "${id}" is not defined in this pack.`);
    }
  };

  pack.resources.forEach((resource, index) => {
    resource.requires.forEach((upgradeId, requireIndex) => {
      ensureUpgrade(upgradeId, ['resources', index, 'requires', requireIndex]);
    });
  });

  const groupMembers = new Map<string, string[]>();

  pack.upgrades.forEach((upgrade, index) => {
    const basePath = ['upgrades', index] as const;

    if (!treeIds.has(upgrade.treeId)) {
      addMissingReference(
        ctx,
        [...basePath, 'tree'],
        `Upgrade tree "${upgrade.treeId}" is not defined in this pack.`,
      );
    }

    upgrade.costs.forEach((cost, costIndex) => {
      ensureResource(cost.resourceId, [...basePath, 'cost', costIndex, 'resource']);
    });
    upgrade.effects.forEach((effect, effectIndex) => {
      ensureResource(effect.resourceId, [...basePath, 'effects', effectIndex, 'resource']);
    });

    upgrade.requires.forEach((requirement, requireIndex) => {
      const requirementPath = [...basePath, 'requires', requireIndex] as const;
      const ids =
        requirement.kind === 'direct' ? [requirement.upgradeId] : requirement.upgradeIds;
      ids.forEach((upgradeId) => {
        if (upgradeId === upgrade.id) {
          addMissingReference(
            ctx,
            requirementPath,
            `Upgrade "${upgrade.id}" cannot require itself.`,
          );
          return;
        }
        ensureUpgrade(upgradeId, requirementPath);
      });

      if (requirement.kind === 'direct') {
        const prerequisite = upgradesById.get(requirement.upgradeId);
        if (prerequisite && prerequisite.year > upgrade.year) {
          warningSink({
            code: 'upgrade.yearBeforePrerequisite',
            message: `Upgrade "${upgrade.id}" unlocks in ${upgrade.year} but requires "${prerequisite.id}" from ${prerequisite.year}.`,
            path: [...requirementPath],
            severity: 'warning',
          });
        }
      }
    });

    upgrade.exclusiveGroups.forEach((group) => {
      const members = groupMembers.get(group);
      if (members) {
        members.push(upgrade.id);
      } else {
        groupMembers.set(group, [upgrade.id]);
      }
    });
  });

  for (const [group, members] of groupMembers) {
    if (members.length === 1) {
      warningSink({
        code: 'exclusiveGroup.singleMember',
        message: `Exclusive group "${group}" only contains "${members[0] ?? ''}".`,
        path: ['upgrades'],
        severity: 'info',
      });
    }
  }

  pack.events.forEach((event, index) => {
    const basePath = ['events', index] as const;
    event.triggers.forEach((trigger, triggerIndex) => {
      ensureResource(trigger.resourceId, [...basePath, 'triggers', triggerIndex, 'resource']);
    });
    event.choices.forEach((choice, choiceIndex) => {
      const choicePath = [...basePath, 'choices', choiceIndex] as const;
      choice.costs.forEach((cost, costIndex) => {
        ensureResource(cost.resourceId, [...choicePath, 'costs', costIndex, 'resource']);
      });
      choice.effects.forEach((effect, effectIndex) => {
        ensureResource(effect.resourceId, [...choicePath, 'effects', effectIndex, 'resource']);
      });
      choice.requirements.forEach((upgradeId, requirementIndex) => {
        ensureUpgrade(upgradeId, [...choicePath, 'requirements', requirementIndex]);
      });
    });
    if (event.triggers.length === 0) {
      warningSink({
        code: 'event.noTriggers',
        message: `Event "${event.id}" has no triggers and will never fire.`,
        path: [...basePath, 'triggers'],
        severity: 'warning',
      });
    }
  });
};
